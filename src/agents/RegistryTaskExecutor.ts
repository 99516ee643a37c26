import { TaskExecutionError, WorkflowError } from '../core/errors';
import type { ContextHandle, TaskExecutionOptions, TaskExecutor } from '../scheduler/types';
import { createLogger } from '../utils/logger';
import type { AgentRegistry } from './AgentRegistry';

const logger = createLogger('RegistryTaskExecutor');

/**
 * 通过注册表解析 executorRef 并运行对应 agent 的执行器
 */
export class RegistryTaskExecutor implements TaskExecutor {
  constructor(private registry: AgentRegistry) {}

  async execute(
    taskId: string,
    executorRef: string,
    input: string,
    context: ContextHandle,
    options: TaskExecutionOptions
  ): Promise<unknown> {
    const agent = this.registry.get(executorRef);
    logger.debug(`Running agent ${agent.name} for task ${taskId}`);

    try {
      return await agent.run(input, context, options.signal);
    } catch (error) {
      if (error instanceof WorkflowError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TaskExecutionError(taskId, `Agent '${executorRef}' failed: ${message}`, error);
    }
  }
}
