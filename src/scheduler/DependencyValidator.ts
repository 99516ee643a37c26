import type { ValidationMode } from '../config/schema';
import { ValidationError } from '../core/errors';
import type { ValidationErrorCode } from '../core/errors';
import type { Task, Workflow } from '../core/types';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { DAGraph } from './DAGraph';

/**
 * 被修剪或拒绝的依赖边
 */
export interface DependencyIssue {
  kind: 'self' | 'duplicate' | 'missing';
  taskId: string;
  dependencyId: string;
}

/**
 * 校验结果
 */
export interface ValidationResult {
  ok: boolean;
  /** permissive 模式下是否修剪过依赖 */
  modified: boolean;
  cyclePath?: string[];
  issues: DependencyIssue[];
  /** 失败原因 */
  error?: ValidationError;
}

export interface ValidateOptions {
  mode?: ValidationMode;
  logger?: Logger;
}

const ISSUE_CODES: Record<DependencyIssue['kind'], ValidationErrorCode> = {
  self: 'SELF_DEPENDENCY',
  duplicate: 'DUPLICATE_DEPENDENCY',
  missing: 'MISSING_DEPENDENCY',
};

function describeIssue(issue: DependencyIssue): string {
  switch (issue.kind) {
    case 'self':
      return `Task ${issue.taskId} depends on itself`;
    case 'duplicate':
      return `Task ${issue.taskId} lists dependency ${issue.dependencyId} more than once`;
    case 'missing':
      return `Task ${issue.taskId} depends on unknown task ${issue.dependencyId}`;
  }
}

/**
 * 找出单个任务的畸形依赖边
 */
function findIssues(task: Task, taskIds: Set<string>): DependencyIssue[] {
  const issues: DependencyIssue[] = [];
  const seen = new Set<string>();

  for (const depId of task.dependencies) {
    if (depId === task.id) {
      issues.push({ kind: 'self', taskId: task.id, dependencyId: depId });
    } else if (seen.has(depId)) {
      issues.push({ kind: 'duplicate', taskId: task.id, dependencyId: depId });
    } else if (!taskIds.has(depId)) {
      issues.push({ kind: 'missing', taskId: task.id, dependencyId: depId });
    }
    seen.add(depId);
  }
  return issues;
}

/**
 * 依次移除自依赖、重复依赖（保留第一次出现）和悬空依赖
 */
function pruneDependencies(task: Task, taskIds: Set<string>): void {
  const withoutSelf = task.dependencies.filter((depId) => depId !== task.id);
  const unique = [...new Set(withoutSelf)];
  task.dependencies = unique.filter((depId) => taskIds.has(depId));
}

/**
 * 在任务集合中查找第一个循环
 * 按集合顺序从每个任务开始 DFS，沿依赖的存储顺序前进
 */
export function findCyclePath(tasks: Map<string, Task>): string[] | undefined {
  const graph = DAGraph.fromNodes(
    [...tasks.values()].map((task) => ({ id: task.id, data: task, dependencies: task.dependencies }))
  );
  return graph.findCyclePath();
}

/**
 * 校验并修复工作流的依赖图
 *
 * permissive 模式下修剪畸形边后再检测循环；strict 模式下第一条畸形边即失败。
 * 循环只报告，不修复。
 */
export function validateDependencies(workflow: Workflow, options: ValidateOptions = {}): ValidationResult {
  const mode = options.mode ?? 'permissive';
  const logger = options.logger ?? createLogger('DependencyValidator');
  const taskIds = new Set(workflow.tasks.keys());

  const issues: DependencyIssue[] = [];
  for (const task of workflow.tasks.values()) {
    issues.push(...findIssues(task, taskIds));
  }

  if (issues.length > 0 && mode === 'strict') {
    const first = issues[0];
    const message = describeIssue(first);
    logger.error(`Validation failed: ${message}`, { workflowId: workflow.id });
    return {
      ok: false,
      modified: false,
      issues,
      error: new ValidationError(message, ISSUE_CODES[first.kind], {
        taskId: first.taskId,
        dependencyId: first.dependencyId,
      }),
    };
  }

  for (const issue of issues) {
    logger.warn(`Pruning dependency: ${describeIssue(issue)}`, { workflowId: workflow.id });
  }
  if (issues.length > 0) {
    for (const task of workflow.tasks.values()) {
      pruneDependencies(task, taskIds);
    }
  }
  const modified = issues.length > 0;

  const cyclePath = findCyclePath(workflow.tasks);
  if (cyclePath) {
    const message = `Cycle detected: ${cyclePath.join(' -> ')}`;
    logger.error(message, { workflowId: workflow.id });
    return {
      ok: false,
      modified,
      cyclePath,
      issues,
      error: new ValidationError(message, 'CYCLE_DETECTED', { cyclePath }),
    };
  }

  logger.debug(`Workflow ${workflow.id} validated`, { tasks: workflow.tasks.size, pruned: issues.length });
  return { ok: true, modified, issues };
}

/**
 * 拓扑分层
 * 每层任务的依赖都在前面的层中；图中有循环时抛出 ValidationError
 */
export function topologicalLayers(workflow: Workflow): string[][] {
  const graph = DAGraph.fromNodes(
    [...workflow.tasks.values()].map((task) => ({ id: task.id, data: task, dependencies: task.dependencies }))
  );
  return graph.topologicalSort();
}
