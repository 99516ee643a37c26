import type { ContextHandle } from '../scheduler/types';
import type { Agent } from './types';

/**
 * 原样返回输入，用于演练和 CLI 演示
 */
export class EchoAgent implements Agent {
  readonly name = 'echo';

  async run(input: string, context: ContextHandle): Promise<string> {
    context.set('input', input);
    return input;
  }
}
