import { z } from 'zod';
import { workflowMetadataSchema } from '../config/schema';
import { TaskStatus, WorkflowStatus } from './types';
import type { Task, Workflow } from './types';

/**
 * 任务的 JSON 表示
 */
export interface TaskJSON {
  id: string;
  title: string;
  description: string;
  executorRef: string;
  dependencies: string[];
  status: TaskStatus;
  result?: unknown;
  error?: { name: string; code: string; message: string };
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  metadata: Record<string, unknown>;
}

/**
 * 工作流的 JSON 表示
 * tasks 保存为数组，避免整数形式的 ID 在对象键中被重新排序
 */
export interface WorkflowJSON {
  id: string;
  title: string;
  description: string;
  query: string;
  status: WorkflowStatus;
  tasks: TaskJSON[];
  results: Record<string, unknown>;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  metadata: Record<string, unknown>;
}

const taskJsonSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  executorRef: z.string(),
  dependencies: z.array(z.string()),
  status: z.nativeEnum(TaskStatus),
  result: z.unknown().optional(),
  error: z.object({ name: z.string(), code: z.string(), message: z.string() }).optional(),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().optional(),
  completedAt: z.coerce.date().optional(),
  metadata: z.record(z.unknown()).default({}),
});

const workflowJsonSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(''),
  query: z.string().default(''),
  status: z.nativeEnum(WorkflowStatus),
  tasks: z.array(taskJsonSchema).default([]),
  results: z.record(z.unknown()).default({}),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().optional(),
  completedAt: z.coerce.date().optional(),
  metadata: workflowMetadataSchema.default({}),
});

/**
 * 序列化任务
 */
export function taskToJSON(task: Task): TaskJSON {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    executorRef: task.executorRef,
    dependencies: [...task.dependencies],
    status: task.status,
    result: task.result,
    error: task.error ? { ...task.error } : undefined,
    createdAt: task.createdAt.toISOString(),
    startedAt: task.startedAt?.toISOString(),
    completedAt: task.completedAt?.toISOString(),
    metadata: { ...task.metadata },
  };
}

/**
 * 序列化工作流
 */
export function workflowToJSON(workflow: Workflow): WorkflowJSON {
  return {
    id: workflow.id,
    title: workflow.title,
    description: workflow.description,
    query: workflow.query,
    status: workflow.status,
    tasks: [...workflow.tasks.values()].map(taskToJSON),
    results: Object.fromEntries(workflow.results),
    createdAt: workflow.createdAt.toISOString(),
    startedAt: workflow.startedAt?.toISOString(),
    completedAt: workflow.completedAt?.toISOString(),
    metadata: { ...workflow.metadata },
  };
}

/**
 * 从 JSON 恢复工作流（输入经过 schema 校验）
 */
export function workflowFromJSON(input: unknown): Workflow {
  const data = workflowJsonSchema.parse(input);

  const tasks = new Map<string, Task>();
  for (const taskData of data.tasks) {
    tasks.set(taskData.id, {
      id: taskData.id,
      title: taskData.title,
      description: taskData.description,
      executorRef: taskData.executorRef,
      dependencies: taskData.dependencies,
      status: taskData.status,
      result: taskData.result,
      error: taskData.error,
      createdAt: taskData.createdAt,
      startedAt: taskData.startedAt,
      completedAt: taskData.completedAt,
      metadata: taskData.metadata,
    });
  }

  return {
    id: data.id,
    title: data.title,
    description: data.description,
    query: data.query,
    tasks,
    status: data.status,
    results: new Map(Object.entries(data.results)),
    createdAt: data.createdAt,
    startedAt: data.startedAt,
    completedAt: data.completedAt,
    metadata: data.metadata,
  };
}
