import type { ContextHandle, ContextStore } from '../scheduler/types';
import { AgentContext, GLOBAL_SCOPE } from './AgentContext';

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

/**
 * In-memory key/value store partitioned by scope
 *
 * Values live for the lifetime of the store; nothing is persisted.
 */
export class InMemoryContextStore implements ContextStore {
  private scopes = new Map<string, Map<string, unknown>>();

  /**
   * Store a value under a key in a scope
   */
  store(key: string, value: unknown, scope: string = GLOBAL_SCOPE): void {
    let entries = this.scopes.get(scope);
    if (!entries) {
      entries = new Map();
      this.scopes.set(scope, entries);
    }
    entries.set(key, value);
  }

  /**
   * Retrieve a value, undefined when absent
   */
  retrieve(key: string, scope: string = GLOBAL_SCOPE): unknown {
    return this.scopes.get(scope)?.get(key);
  }

  has(key: string, scope: string = GLOBAL_SCOPE): boolean {
    return this.scopes.get(scope)?.has(key) ?? false;
  }

  /**
   * Delete a key; returns whether it existed
   */
  delete(key: string, scope: string = GLOBAL_SCOPE): boolean {
    const entries = this.scopes.get(scope);
    if (!entries) return false;

    const deleted = entries.delete(key);
    if (entries.size === 0) {
      this.scopes.delete(scope);
    }
    return deleted;
  }

  /**
   * List keys in a scope matching a glob pattern (`*` matches any run of characters)
   */
  listKeys(pattern = '*', scope: string = GLOBAL_SCOPE): string[] {
    const matcher = globToRegExp(pattern);
    return [...(this.scopes.get(scope)?.keys() ?? [])].filter((key) => matcher.test(key));
  }

  /**
   * Scopes that currently hold values
   */
  listScopes(): string[] {
    return [...this.scopes.keys()];
  }

  /**
   * Drop every value in a scope
   */
  clearScope(scope: string): void {
    this.scopes.delete(scope);
  }

  clear(): void {
    this.scopes.clear();
  }

  createContext(workflowId: string, taskId: string): ContextHandle {
    return new AgentContext(this, workflowId, taskId);
  }
}
