/**
 * 调度层类型定义
 */
import type { SchedulerConfigInput } from '../config/schema';
import type { TaskError, TaskStatus, WorkflowStatus } from '../core/types';
import type { EventBus } from '../utils/event-bus';
import type { Logger } from '../utils/logger';

/**
 * DAG 节点接口
 */
export interface DAGNode<T> {
  id: string;
  data: T;
  dependencies: string[];
}

/**
 * 图边接口，from 依赖于 to
 */
export interface GraphEdge {
  from: string;
  to: string;
}

/**
 * 状态事件类型
 */
export type StatusEventType =
  | 'task_started'
  | 'task_completed'
  | 'task_failed'
  | 'workflow_started'
  | 'workflow_completed'
  | 'workflow_failed';

/**
 * 状态事件
 */
export interface StatusEvent {
  type: StatusEventType;
  workflowId: string;
  /** 任务级事件才有 */
  taskId?: string;
  status: TaskStatus | WorkflowStatus;
  message: string;
  timestamp: Date;
  error?: TaskError;
}

/**
 * 每次运行可选的状态回调，可同步或异步
 */
export type StatusNotifier = (event: StatusEvent) => void | Promise<void>;

/**
 * 交给执行器的上下文句柄，绑定到 workflow:<id>:task:<id> 作用域
 */
export interface ContextHandle {
  readonly workflowId: string;
  readonly taskId: string;
  readonly scope: string;
  readonly metadata: Record<string, unknown>;
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): boolean;
}

/**
 * 上下文存储
 */
export interface ContextStore {
  createContext(workflowId: string, taskId: string): ContextHandle;
}

export interface TaskExecutionOptions {
  /** 超时或取消时触发 */
  signal: AbortSignal;
}

/**
 * 任务执行器
 * resolve 即成功，reject 即失败；调度器不重试
 */
export interface TaskExecutor {
  execute(
    taskId: string,
    executorRef: string,
    input: string,
    context: ContextHandle,
    options: TaskExecutionOptions
  ): Promise<unknown>;
}

/**
 * 资源分配结果
 */
export interface ResourceAllocation {
  success: boolean;
  /** 资源池 → 已分配单位数 */
  allocated: Record<string, number>;
  message?: string;
}

/**
 * 工作流级资源分配器
 */
export interface ResourceAllocator {
  allocate(ownerId: string, requirements?: Record<string, number>): Promise<ResourceAllocation>;
  release(ownerId: string): void;
}

/**
 * 调度器选项
 */
export interface SchedulerOptions extends SchedulerConfigInput {
  /** 时间源，测试中注入以获得确定的时间戳 */
  clock?: () => Date;
  logger?: Logger;
  eventBus?: EventBus;
  contextStore?: ContextStore;
  resourceManager?: ResourceAllocator;
}

/**
 * 单次运行选项
 */
export interface RunOptions {
  /** 外部取消信号 */
  signal?: AbortSignal;
}
