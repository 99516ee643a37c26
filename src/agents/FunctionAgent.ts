import type { ContextHandle } from '../scheduler/types';
import type { Agent } from './types';

export type AgentFunction = (input: string, context: ContextHandle, signal: AbortSignal) => unknown;

/**
 * 把普通（同步或异步）函数包装成 agent
 */
export class FunctionAgent implements Agent {
  constructor(
    readonly name: string,
    private fn: AgentFunction
  ) {}

  async run(input: string, context: ContextHandle, signal: AbortSignal): Promise<unknown> {
    return this.fn(input, context, signal);
  }
}
