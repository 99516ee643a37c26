import { describe, it, expect } from 'vitest';
import type { BaseMessage } from '@langchain/core/messages';
import { WorkflowPlanner, parsePlan } from '../../src/agents/WorkflowPlanner.js';
import { PlanParseError, ValidationError } from '../../src/core/errors.js';
import { WorkflowStatus } from '../../src/core/types.js';
import type { ChatModel } from '../../src/core/model/ChatModel.js';
import { WorkflowScheduler } from '../../src/scheduler/WorkflowScheduler.js';
import { StubExecutor } from '../helpers.js';

function recordingModel(reply: string): { model: ChatModel; calls: BaseMessage[][] } {
  const calls: BaseMessage[][] = [];
  return {
    calls,
    model: {
      invoke: async (messages) => {
        calls.push(messages);
        return { content: reply };
      },
    },
  };
}

describe('parsePlan', () => {
  it('should parse a fenced JSON plan', () => {
    const plan = parsePlan('```json\n{"tasks": [{"title": "Search", "executorRef": "llm"}]}\n```');

    expect(plan.tasks).toEqual([
      { title: 'Search', description: '', executorRef: 'llm', dependencies: [], metadata: {} },
    ]);
  });

  it('should keep the raw output on invalid JSON', () => {
    try {
      parsePlan('Sure! Here is the plan');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PlanParseError);
      if (error instanceof PlanParseError) {
        expect(error.details).toEqual({ rawResult: 'Sure! Here is the plan' });
      }
    }
  });

  it('should reject plans without tasks', () => {
    expect(() => parsePlan('{"tasks": []}')).toThrow('Plan does not match schema');
  });
});

describe('WorkflowPlanner', () => {
  it('should plan and validate a workflow', async () => {
    const { model, calls } = recordingModel(
      '{"tasks": [{"id": "a", "title": "Research", "executorRef": "llm"}, {"id": "b", "title": "Write", "executorRef": "llm", "dependencies": [0]}]}'
    );
    const scheduler = new WorkflowScheduler(new StubExecutor());
    const planner = new WorkflowPlanner({ model, validator: scheduler, agentRefs: ['llm', 'echo'] });

    const workflow = await planner.plan('summarize the news', { audience: 'execs' });

    expect(workflow.status).toBe(WorkflowStatus.READY);
    expect(workflow.title).toBe('Workflow for: summarize the news');
    expect(workflow.tasks.get('b')?.dependencies).toEqual(['a']);
    expect(calls[0]?.[1]?.content).toBe('summarize the news\n\nUser Context:\naudience: execs');
    expect(calls[0]?.[0]?.content).toContain('- llm\n- echo');
  });

  it('should fail the workflow when the plan has a cycle', async () => {
    const { model } = recordingModel(
      '{"tasks": [{"title": "A", "executorRef": "llm", "dependencies": [1]}, {"title": "B", "executorRef": "llm", "dependencies": [0]}]}'
    );
    const planner = new WorkflowPlanner({ model, validator: new WorkflowScheduler(new StubExecutor()) });
    const workflow = planner.createWorkflow('loop');

    await expect(planner.planWorkflow(workflow)).rejects.toBeInstanceOf(ValidationError);

    const [first, second] = [...workflow.tasks.keys()];
    expect(workflow.status).toBe(WorkflowStatus.FAILED);
    expect(workflow.metadata.cyclePath).toEqual([first, second, first]);
    expect(workflow.metadata.planningError).toBe(`Cycle detected: ${first} -> ${second} -> ${first}`);
  });

  it('should record model failures as planning errors', async () => {
    const model: ChatModel = { invoke: () => Promise.reject(new Error('connection reset')) };
    const planner = new WorkflowPlanner({ model });
    const workflow = planner.createWorkflow('anything');

    await expect(planner.planWorkflow(workflow)).rejects.toThrow('connection reset');
    expect(workflow.status).toBe(WorkflowStatus.FAILED);
    expect(workflow.metadata.planningError).toBe('connection reset');
    expect(workflow.completedAt).toBeInstanceOf(Date);
  });
});
