import { describe, it, expect } from 'vitest';
import { workflowFromJSON, workflowToJSON } from '../../src/core/serialization.js';
import { TaskStatus, WorkflowStatus } from '../../src/core/types.js';
import { WorkflowScheduler } from '../../src/scheduler/WorkflowScheduler.js';
import { StubExecutor, makeWorkflow, steppingClock } from '../helpers.js';

describe('serialization', () => {
  it('should restore a finished workflow from JSON', async () => {
    const workflow = makeWorkflow([{ id: '2' }, { id: '1', deps: ['2'] }], { externalContext: { region: 'eu' } });
    await new WorkflowScheduler(new StubExecutor(), { clock: steppingClock() }).run(workflow);

    const restored = workflowFromJSON(JSON.parse(JSON.stringify(workflowToJSON(workflow))));

    expect([...restored.tasks.keys()]).toEqual(['2', '1']);
    expect(restored.status).toBe(WorkflowStatus.COMPLETED);
    expect(restored.tasks.get('1')?.status).toBe(TaskStatus.COMPLETED);
    expect(restored.tasks.get('1')?.startedAt).toEqual(workflow.tasks.get('1')?.startedAt);
    expect(restored.results.get('2')).toBe('result:2');
    expect(restored.metadata.externalContext).toEqual({ region: 'eu' });
  });

  it('should write dates as ISO strings', () => {
    const json = workflowToJSON(makeWorkflow([{ id: 'A' }]));

    expect(json.createdAt).toBe('1970-01-01T00:00:00.000Z');
    expect(json.tasks[0]?.status).toBe(TaskStatus.PENDING);
  });

  it('should reject malformed input', () => {
    expect(() => workflowFromJSON({ id: 'x', title: 't', status: 'exploded', createdAt: '2024-01-01' })).toThrow();
  });
});
