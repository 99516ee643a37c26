import { describe, it, expect } from 'vitest';
import {
  TaskStatus,
  WorkflowStatus,
  addTask,
  createTask,
  createWorkflow,
  getTask,
  isTerminalTaskStatus,
  transitionTask,
} from '../../src/core/types.js';
import { WorkflowStateError } from '../../src/core/errors.js';

const newTask = (id: string) =>
  createTask({ id, title: id, description: '', executorRef: 'echo', createdAt: new Date(5000) });

describe('core types', () => {
  it('should create a pending task with copied dependencies', () => {
    const dependencies = ['A'];
    const task = createTask({ title: 'T', description: 'd', executorRef: 'echo', dependencies });
    dependencies.push('B');

    expect(task.status).toBe(TaskStatus.PENDING);
    expect(task.dependencies).toEqual(['A']);
    expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should only add tasks while planning', () => {
    const workflow = createWorkflow({ title: 'W', query: 'q' });
    addTask(workflow, newTask('A'));

    expect(getTask(workflow, 'A')?.title).toBe('A');
    expect(getTask(workflow, 'B')).toBeUndefined();
    expect(() => addTask(workflow, newTask('A'))).toThrow(WorkflowStateError);

    workflow.status = WorkflowStatus.READY;
    expect(() => addTask(workflow, newTask('B'))).toThrow('Cannot add task B');
  });

  describe('transitionTask', () => {
    it('should stamp start and completion times', () => {
      const task = newTask('A');

      transitionTask(task, TaskStatus.RUNNING, new Date(6000));
      transitionTask(task, TaskStatus.COMPLETED, new Date(7000));

      expect(task.startedAt).toEqual(new Date(6000));
      expect(task.completedAt).toEqual(new Date(7000));
    });

    it('should clamp timestamps that go backwards', () => {
      const task = newTask('A');

      transitionTask(task, TaskStatus.RUNNING, new Date(1000));
      transitionTask(task, TaskStatus.FAILED, new Date(0));

      expect(task.startedAt).toEqual(new Date(5000));
      expect(task.completedAt).toEqual(new Date(5000));
    });

    it('should reject illegal transitions', () => {
      const task = newTask('A');

      expect(() => transitionTask(task, TaskStatus.COMPLETED, new Date())).toThrow(
        'Illegal task transition pending -> completed for task A'
      );

      transitionTask(task, TaskStatus.RUNNING, new Date());
      transitionTask(task, TaskStatus.FAILED, new Date());
      expect(() => transitionTask(task, TaskStatus.RUNNING, new Date())).toThrow(WorkflowStateError);
      expect(isTerminalTaskStatus(task.status)).toBe(true);
    });
  });
});
