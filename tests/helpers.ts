import { addTask, createTask, createWorkflow } from '../src/core/types.js';
import type { Workflow, WorkflowMetadata } from '../src/core/types.js';
import type { ContextHandle, TaskExecutionOptions, TaskExecutor } from '../src/scheduler/types.js';

export interface TaskFixture {
  id: string;
  deps?: string[];
  ref?: string;
  title?: string;
  description?: string;
  metadata?: Record<string, unknown>;
}

/**
 * PLANNING workflow with tasks inserted in the given order
 */
export function makeWorkflow(tasks: TaskFixture[], metadata: WorkflowMetadata = {}, id = 'wf-1'): Workflow {
  const workflow = createWorkflow({
    id,
    title: 'Test workflow',
    query: 'test query',
    metadata,
    createdAt: new Date(0),
  });
  for (const fixture of tasks) {
    addTask(
      workflow,
      createTask({
        id: fixture.id,
        title: fixture.title ?? `Task ${fixture.id}`,
        description: fixture.description ?? `Do ${fixture.id}`,
        executorRef: fixture.ref ?? 'stub',
        dependencies: fixture.deps ?? [],
        metadata: fixture.metadata,
        createdAt: new Date(0),
      })
    );
  }
  return workflow;
}

export interface ExecutorCall {
  taskId: string;
  executorRef: string;
  input: string;
  context: ContextHandle;
}

type Behavior = (input: string, signal: AbortSignal, context: ContextHandle) => unknown;

/**
 * Executor that records every call; tasks without a behavior succeed with `result:<id>`
 */
export class StubExecutor implements TaskExecutor {
  readonly calls: ExecutorCall[] = [];

  constructor(private behaviors: Record<string, Behavior> = {}) {}

  get order(): string[] {
    return this.calls.map((call) => call.taskId);
  }

  async execute(
    taskId: string,
    executorRef: string,
    input: string,
    context: ContextHandle,
    options: TaskExecutionOptions
  ): Promise<unknown> {
    this.calls.push({ taskId, executorRef, input, context });
    const behavior = this.behaviors[taskId];
    return behavior ? behavior(input, options.signal, context) : `result:${taskId}`;
  }
}

/**
 * Clock advancing one second per reading, starting at 1970-01-01T00:00:01Z
 */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(++tick * 1000);
}

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Promise that settles only when released
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
