import type { TaskError } from './types';

/**
 * 错误码
 */
export type WorkflowErrorCode =
  | 'CYCLE_DETECTED'
  | 'SELF_DEPENDENCY'
  | 'DUPLICATE_DEPENDENCY'
  | 'MISSING_DEPENDENCY'
  | 'EXECUTION_FAILED'
  | 'TASK_TIMEOUT'
  | 'TASK_CANCELLED'
  | 'AGENT_NOT_FOUND'
  | 'INVALID_STATE'
  | 'INVALID_PLAN';

export type ValidationErrorCode = Extract<
  WorkflowErrorCode,
  'CYCLE_DETECTED' | 'SELF_DEPENDENCY' | 'DUPLICATE_DEPENDENCY' | 'MISSING_DEPENDENCY'
>;

/**
 * 所有调度相关错误的基类
 */
export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: WorkflowErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/**
 * 依赖图校验失败（循环或畸形依赖），在任何任务执行之前抛出
 */
export class ValidationError extends WorkflowError {
  readonly cyclePath?: string[];

  constructor(
    message: string,
    code: ValidationErrorCode,
    details: { cyclePath?: string[]; taskId?: string; dependencyId?: string } = {}
  ) {
    super(message, code, details);
    this.name = 'ValidationError';
    this.cyclePath = details.cyclePath;
  }
}

/**
 * 执行器返回失败
 */
export class TaskExecutionError extends WorkflowError {
  constructor(
    public readonly taskId: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message, 'EXECUTION_FAILED', { taskId });
    this.name = 'TaskExecutionError';
  }
}

/**
 * 执行器调用超时，按执行失败处理
 */
export class TaskTimeoutError extends WorkflowError {
  constructor(
    public readonly taskId: string,
    public readonly timeoutMs: number
  ) {
    super(`Task ${taskId} timed out after ${timeoutMs}ms`, 'TASK_TIMEOUT', { taskId, timeoutMs });
    this.name = 'TaskTimeoutError';
  }
}

/**
 * 工作流被取消时仍在执行的任务
 */
export class TaskCancelledError extends WorkflowError {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} was cancelled`, 'TASK_CANCELLED', { taskId });
    this.name = 'TaskCancelledError';
  }
}

/**
 * executorRef 在注册表中不存在
 */
export class AgentNotFoundError extends WorkflowError {
  constructor(public readonly agentRef: string) {
    super(`Agent '${agentRef}' not registered or instantiated`, 'AGENT_NOT_FOUND', { agentRef });
    this.name = 'AgentNotFoundError';
  }
}

/**
 * 在不允许的状态下调用操作，或非法的状态迁移
 * 属于程序错误，直接抛出而不记录到模型中
 */
export class WorkflowStateError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_STATE', details);
    this.name = 'WorkflowStateError';
  }
}

/**
 * Planner 返回的计划无法解析
 */
export class PlanParseError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_PLAN', details);
    this.name = 'PlanParseError';
  }
}

/**
 * 将任意抛出值转换为可序列化的任务错误记录
 */
export function toTaskError(error: unknown): TaskError {
  if (error instanceof WorkflowError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: 'EXECUTION_FAILED', message: error.message };
  }
  return { name: 'Error', code: 'EXECUTION_FAILED', message: String(error) };
}
