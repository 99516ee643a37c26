import type { ContextHandle } from '../scheduler/types';
import type { InMemoryContextStore } from './ContextStore';

/**
 * Scope shared by every task
 */
export const GLOBAL_SCOPE = 'global';

/**
 * Scope name for a task's private context
 */
export function taskScope(workflowId: string, taskId: string): string {
  return `workflow:${workflowId}:task:${taskId}`;
}

/**
 * Context handle bound to one task's scope
 *
 * Reads fall through to the global scope when the task scope has no value.
 * Writes and deletes only touch the task scope.
 */
export class AgentContext implements ContextHandle {
  readonly scope: string;
  readonly metadata: Record<string, unknown> = {};

  constructor(
    private readonly store: InMemoryContextStore,
    readonly workflowId: string,
    readonly taskId: string
  ) {
    this.scope = taskScope(workflowId, taskId);
  }

  get(key: string): unknown {
    if (this.store.has(key, this.scope)) {
      return this.store.retrieve(key, this.scope);
    }
    return this.store.retrieve(key, GLOBAL_SCOPE);
  }

  set(key: string, value: unknown): void {
    this.store.store(key, value, this.scope);
  }

  delete(key: string): boolean {
    return this.store.delete(key, this.scope);
  }

  /**
   * Keys written by this task
   */
  keys(pattern = '*'): string[] {
    return this.store.listKeys(pattern, this.scope);
  }
}
