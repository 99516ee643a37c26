import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { buildReport, formatReport } from '../../src/scheduler/ExecutionReport.js';
import { TaskStatus, WorkflowStatus, transitionTask } from '../../src/core/types.js';
import { makeWorkflow } from '../helpers.js';

describe('buildReport', () => {
  it('should summarize task statuses', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B' }, { id: 'C' }]);
    const a = workflow.tasks.get('A');
    const b = workflow.tasks.get('B');
    if (!a || !b) throw new Error('missing tasks');
    transitionTask(a, TaskStatus.RUNNING, new Date(1000));
    transitionTask(a, TaskStatus.COMPLETED, new Date(2000));
    a.result = 'ok';
    transitionTask(b, TaskStatus.RUNNING, new Date(1000));

    const report = buildReport(workflow);

    expect(report.summary).toEqual({ total: 3, pending: 1, running: 1, completed: 1, failed: 0 });
    expect(report.tasks.A).toEqual({
      title: 'Task A',
      agentRef: 'stub',
      status: TaskStatus.COMPLETED,
      result: 'ok',
      error: undefined,
      startedAt: new Date(1000),
      completedAt: new Date(2000),
    });
    expect(report.status).toBe(WorkflowStatus.PLANNING);
  });

  it('should not share mutable state with the workflow', () => {
    const workflow = makeWorkflow([{ id: 'A' }], { cyclePath: ['A', 'A'] });
    const task = workflow.tasks.get('A');
    if (!task) throw new Error('missing task');
    task.result = { items: [1, 2] };

    const report = buildReport(workflow);
    report.cyclePath?.push('B');
    const result = report.tasks.A?.result;
    if (result && typeof result === 'object' && 'items' in result && Array.isArray(result.items)) {
      result.items.push(3);
    }

    expect(workflow.metadata.cyclePath).toEqual(['A', 'A']);
    expect(task.result).toEqual({ items: [1, 2] });
  });
});

describe('formatReport', () => {
  it('should render a failed workflow', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A'] }], {
        error: 'deadlocked',
        blockedTasks: ['B'],
      });
      const a = workflow.tasks.get('A');
      if (!a) throw new Error('missing task');
      transitionTask(a, TaskStatus.RUNNING, new Date(1000));
      transitionTask(a, TaskStatus.FAILED, new Date(2000));
      a.error = { name: 'Error', code: 'EXECUTION_FAILED', message: 'boom' };

      expect(formatReport(buildReport(workflow)).split('\n')).toEqual([
        'Workflow: Test workflow',
        'ID: wf-1',
        'Status: planning',
        'Error: deadlocked',
        'Blocked: B',
        '',
        '  FAILED     Task A (A) [stub]',
        '             EXECUTION_FAILED: boom',
        '  PENDING    Task B (B) [stub]',
        '',
        'Total: 2  Completed: 0  Failed: 1  Pending: 1  Running: 0',
      ]);
    } finally {
      chalk.level = level;
    }
  });

  it('should preview a result that JSON cannot encode', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      const workflow = makeWorkflow([{ id: 'A' }]);
      const a = workflow.tasks.get('A');
      if (!a) throw new Error('missing task');
      transitionTask(a, TaskStatus.RUNNING, new Date(1000));
      transitionTask(a, TaskStatus.COMPLETED, new Date(2000));
      a.result = 10n;

      expect(formatReport(buildReport(workflow)).split('\n').slice(4, 6)).toEqual([
        '  COMPLETED  Task A (A) [stub]',
        '             10',
      ]);
    } finally {
      chalk.level = level;
    }
  });
});
