/**
 * 核心类型定义
 * 工作流与任务的数据模型，以及创建和状态迁移的工厂函数
 */
import { v4 as uuidv4 } from 'uuid';
import { WorkflowStateError } from './errors';

/**
 * 任务状态枚举
 * PENDING → RUNNING → COMPLETED | FAILED，终态不可再迁移
 */
export enum TaskStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * 工作流状态枚举
 */
export enum WorkflowStatus {
  /** 正在组装任务与依赖，尚未通过校验 */
  PLANNING = 'planning',
  /** 已通过校验，尚未开始执行 */
  READY = 'ready',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * 任务失败时记录的结构化错误
 */
export interface TaskError {
  name: string;
  code: string;
  message: string;
}

/**
 * 任务接口
 */
export interface Task {
  readonly id: string;
  title: string;
  /** 交给执行器的任务内容 */
  description: string;
  /** 执行该任务的 agent 标识，由外部解析 */
  executorRef: string;
  /** 必须先完成的任务 ID */
  dependencies: string[];
  status: TaskStatus;
  /** COMPLETED 时设置，与 error 互斥 */
  result?: unknown;
  /** FAILED 时设置，与 result 互斥 */
  error?: TaskError;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  metadata: Record<string, unknown>;
}

/**
 * 工作流元数据中约定的键
 */
export interface WorkflowMetadata extends Record<string, unknown> {
  /** 校验失败时的可读描述 */
  planningError?: string;
  /** 校验发现的循环路径 */
  cyclePath?: string[];
  /** 执行期的终止原因，如 'deadlocked' */
  error?: string;
  /** 死锁时仍处于 PENDING 的任务 */
  blockedTasks?: string[];
  /** 合并到任务输入中的外部上下文 */
  externalContext?: Record<string, unknown>;
  /** 资源需求，资源池 → 单位数 */
  resourceRequirements?: Record<string, number>;
}

/**
 * 工作流接口
 */
export interface Workflow {
  readonly id: string;
  title: string;
  description: string;
  /** 生成该任务集合的原始请求 */
  query: string;
  /** 按插入顺序迭代 */
  tasks: Map<string, Task>;
  status: WorkflowStatus;
  /** tasks[id].result 的冗余视图，任务完成时写入 */
  results: Map<string, unknown>;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  metadata: WorkflowMetadata;
}

/**
 * 创建任务的工厂函数
 */
export function createTask(params: {
  id?: string;
  title: string;
  description: string;
  executorRef: string;
  dependencies?: string[];
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}): Task {
  return {
    id: params.id ?? uuidv4(),
    title: params.title,
    description: params.description,
    executorRef: params.executorRef,
    dependencies: [...(params.dependencies ?? [])],
    status: TaskStatus.PENDING,
    createdAt: params.createdAt ?? new Date(),
    metadata: { ...params.metadata },
  };
}

/**
 * 创建工作流的工厂函数
 */
export function createWorkflow(params: {
  id?: string;
  title: string;
  description?: string;
  query: string;
  metadata?: WorkflowMetadata;
  createdAt?: Date;
}): Workflow {
  return {
    id: params.id ?? uuidv4(),
    title: params.title,
    description: params.description ?? '',
    query: params.query,
    tasks: new Map(),
    status: WorkflowStatus.PLANNING,
    results: new Map(),
    createdAt: params.createdAt ?? new Date(),
    metadata: { ...params.metadata },
  };
}

/**
 * 向工作流添加任务，仅允许在 PLANNING 阶段
 */
export function addTask(workflow: Workflow, task: Task): void {
  if (workflow.status !== WorkflowStatus.PLANNING) {
    throw new WorkflowStateError(
      `Cannot add task ${task.id} to workflow ${workflow.id} in status ${workflow.status}`,
      { workflowId: workflow.id, taskId: task.id }
    );
  }
  if (workflow.tasks.has(task.id)) {
    throw new WorkflowStateError(`Task ${task.id} already exists in workflow ${workflow.id}`, {
      workflowId: workflow.id,
      taskId: task.id,
    });
  }
  workflow.tasks.set(task.id, task);
}

/**
 * 获取任务
 */
export function getTask(workflow: Workflow, taskId: string): Task | undefined {
  return workflow.tasks.get(taskId);
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return status === TaskStatus.COMPLETED || status === TaskStatus.FAILED;
}

export function isTerminalWorkflowStatus(status: WorkflowStatus): boolean {
  return status === WorkflowStatus.COMPLETED || status === WorkflowStatus.FAILED;
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  [TaskStatus.PENDING]: [TaskStatus.RUNNING],
  [TaskStatus.RUNNING]: [TaskStatus.COMPLETED, TaskStatus.FAILED],
  [TaskStatus.COMPLETED]: [],
  [TaskStatus.FAILED]: [],
};

/**
 * 任务状态迁移
 * 进入 RUNNING 时写入 startedAt，进入终态时写入 completedAt，
 * 时间戳保持 createdAt ≤ startedAt ≤ completedAt
 */
export function transitionTask(task: Task, next: TaskStatus, at: Date): void {
  if (!ALLOWED_TRANSITIONS[task.status].includes(next)) {
    throw new WorkflowStateError(`Illegal task transition ${task.status} -> ${next} for task ${task.id}`, {
      taskId: task.id,
      from: task.status,
      to: next,
    });
  }

  task.status = next;
  if (next === TaskStatus.RUNNING) {
    task.startedAt = at < task.createdAt ? task.createdAt : at;
    return;
  }

  const floor = task.startedAt ?? task.createdAt;
  task.completedAt = at < floor ? floor : at;
}
