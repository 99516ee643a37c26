import { TaskStatus } from '../core/types';
import type { Task, Workflow } from '../core/types';

/**
 * 判断任务是否可以执行：自身 PENDING 且所有依赖都已 COMPLETED
 */
export function isExecutable(task: Task, workflow: Workflow): boolean {
  if (task.status !== TaskStatus.PENDING) {
    return false;
  }
  return task.dependencies.every((depId) => workflow.tasks.get(depId)?.status === TaskStatus.COMPLETED);
}

/**
 * 当前可执行的任务，按工作流中的顺序
 */
export function executable(workflow: Workflow): Task[] {
  return [...workflow.tasks.values()].filter((task) => isExecutable(task, workflow));
}

export function hasRunningTasks(workflow: Workflow): boolean {
  return [...workflow.tasks.values()].some((task) => task.status === TaskStatus.RUNNING);
}

export function allCompleted(workflow: Workflow): boolean {
  return [...workflow.tasks.values()].every((task) => task.status === TaskStatus.COMPLETED);
}

/**
 * 永远无法执行的 PENDING 任务：某个传递依赖已失败，或依赖本身被阻塞
 */
export function blockedTasks(workflow: Workflow): string[] {
  const memo = new Map<string, boolean>();

  const isBlocked = (taskId: string): boolean => {
    const cached = memo.get(taskId);
    if (cached !== undefined) {
      return cached;
    }
    // 防止畸形图上的无限递归
    memo.set(taskId, false);

    const task = workflow.tasks.get(taskId);
    let blocked = false;
    if (task && task.status === TaskStatus.PENDING) {
      blocked = task.dependencies.some((depId) => {
        const dep = workflow.tasks.get(depId);
        return dep === undefined || dep.status === TaskStatus.FAILED || isBlocked(depId);
      });
    }
    memo.set(taskId, blocked);
    return blocked;
  };

  return [...workflow.tasks.keys()].filter(isBlocked);
}
