import { describe, it, expect } from 'vitest';
import {
  allCompleted,
  blockedTasks,
  executable,
  hasRunningTasks,
  isExecutable,
} from '../../src/scheduler/ReadinessSelector.js';
import { TaskStatus, transitionTask } from '../../src/core/types.js';
import type { Workflow } from '../../src/core/types.js';
import { makeWorkflow } from '../helpers.js';
import type { TaskFixture } from '../helpers.js';

const at = new Date(1000);

function complete(workflow: Workflow, id: string): void {
  const task = workflow.tasks.get(id);
  if (!task) throw new Error(`no task ${id}`);
  transitionTask(task, TaskStatus.RUNNING, at);
  transitionTask(task, TaskStatus.COMPLETED, at);
}

function fail(workflow: Workflow, id: string): void {
  const task = workflow.tasks.get(id);
  if (!task) throw new Error(`no task ${id}`);
  transitionTask(task, TaskStatus.RUNNING, at);
  transitionTask(task, TaskStatus.FAILED, at);
}

/**
 * Deterministic pseudo-random DAG: task i may only depend on tasks before it
 */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

function randomDag(seed: number, size: number): TaskFixture[] {
  const next = lcg(seed);
  return Array.from({ length: size }, (_, i) => ({
    id: `t${i}`,
    deps: Array.from({ length: i }, (_, j) => `t${j}`).filter(() => next() < 0.3),
  }));
}

describe('ReadinessSelector', () => {
  it('should select tasks whose dependencies are all completed', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A'] }, { id: 'C' }]);

    expect(executable(workflow).map((t) => t.id)).toEqual(['A', 'C']);

    complete(workflow, 'A');
    expect(executable(workflow).map((t) => t.id)).toEqual(['B', 'C']);
  });

  it('should not select running or finished tasks', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B' }]);
    const a = workflow.tasks.get('A');
    if (a) transitionTask(a, TaskStatus.RUNNING, at);

    expect(executable(workflow).map((t) => t.id)).toEqual(['B']);
    expect(hasRunningTasks(workflow)).toBe(true);
  });

  it('should treat a missing dependency as not satisfied', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['ghost'] }]);
    const task = workflow.tasks.get('A');

    expect(task && isExecutable(task, workflow)).toBe(false);
  });

  it('should report allCompleted for an empty workflow', () => {
    expect(allCompleted(makeWorkflow([]))).toBe(true);
  });

  it('should find tasks blocked transitively by a failure', () => {
    const workflow = makeWorkflow([
      { id: 'A' },
      { id: 'B', deps: ['A'] },
      { id: 'C', deps: ['B'] },
      { id: 'D' },
    ]);
    fail(workflow, 'A');

    expect(blockedTasks(workflow)).toEqual(['B', 'C']);
  });

  it('should only ever select tasks whose dependencies completed', () => {
    for (const seed of [1, 7, 42, 99, 2024]) {
      const workflow = makeWorkflow(randomDag(seed, 12));
      const done: string[] = [];

      for (let ready = executable(workflow); ready.length > 0; ready = executable(workflow)) {
        const [task] = ready;
        if (!task) break;
        for (const dep of task.dependencies) {
          expect(done).toContain(dep);
        }
        complete(workflow, task.id);
        done.push(task.id);
      }

      expect(done).toHaveLength(12);
      expect(allCompleted(workflow)).toBe(true);
    }
  });

  it('should select exactly the pending tasks whose dependencies all completed', () => {
    const statuses = [TaskStatus.PENDING, TaskStatus.RUNNING, TaskStatus.COMPLETED, TaskStatus.FAILED];

    for (const seed of [3, 11, 58, 314, 4096, 65537]) {
      const next = lcg(seed);
      const workflow = makeWorkflow(randomDag(seed, 15));
      for (const task of workflow.tasks.values()) {
        const status = statuses[Math.floor(next() * statuses.length)] ?? TaskStatus.PENDING;
        if (status !== TaskStatus.PENDING) transitionTask(task, TaskStatus.RUNNING, at);
        if (status === TaskStatus.COMPLETED || status === TaskStatus.FAILED) transitionTask(task, status, at);
      }

      const expected = [...workflow.tasks.values()]
        .filter(
          (task) =>
            task.status === TaskStatus.PENDING &&
            task.dependencies.every((dep) => workflow.tasks.get(dep)?.status === TaskStatus.COMPLETED)
        )
        .map((task) => task.id);

      expect(executable(workflow).map((task) => task.id)).toEqual(expected);
    }
  });
});
