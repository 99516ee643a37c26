import { describe, it, expect } from 'vitest';
import {
  findCyclePath,
  topologicalLayers,
  validateDependencies,
} from '../../src/scheduler/DependencyValidator.js';
import { ValidationError } from '../../src/core/errors.js';
import { makeWorkflow } from '../helpers.js';

describe('validateDependencies', () => {
  it('should accept a valid DAG unchanged', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A'] }, { id: 'C', deps: ['A', 'B'] }]);

    const result = validateDependencies(workflow);

    expect(result).toEqual({ ok: true, modified: false, issues: [] });
    expect(workflow.tasks.get('C')?.dependencies).toEqual(['A', 'B']);
  });

  it('should remove self dependencies', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['A'] }, { id: 'B', deps: ['B', 'A'] }]);

    const result = validateDependencies(workflow);

    expect(result.ok).toBe(true);
    expect(result.modified).toBe(true);
    expect(workflow.tasks.get('A')?.dependencies).toEqual([]);
    expect(workflow.tasks.get('B')?.dependencies).toEqual(['A']);
  });

  it('should remove duplicate dependencies keeping the first occurrence', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B' }, { id: 'C', deps: ['B', 'A', 'B', 'A'] }]);

    const result = validateDependencies(workflow);

    expect(result.ok).toBe(true);
    expect(workflow.tasks.get('C')?.dependencies).toEqual(['B', 'A']);
    expect(result.issues).toEqual([
      { kind: 'duplicate', taskId: 'C', dependencyId: 'B' },
      { kind: 'duplicate', taskId: 'C', dependencyId: 'A' },
    ]);
  });

  it('should remove dangling references', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['ghost'] }]);

    const result = validateDependencies(workflow);

    expect(result.ok).toBe(true);
    expect(result.modified).toBe(true);
    expect(result.issues).toEqual([{ kind: 'missing', taskId: 'A', dependencyId: 'ghost' }]);
    expect(workflow.tasks.get('A')?.dependencies).toEqual([]);
  });

  it('should be idempotent', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['A', 'x'] }, { id: 'B', deps: ['A', 'A'] }]);

    validateDependencies(workflow);
    const second = validateDependencies(workflow);

    expect(second).toEqual({ ok: true, modified: false, issues: [] });
    expect(workflow.tasks.get('B')?.dependencies).toEqual(['A']);
  });

  it('should report a 2-cycle starting from the first task in map order', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['B'] }, { id: 'B', deps: ['A'] }]);

    const result = validateDependencies(workflow);

    expect(result.ok).toBe(false);
    expect(result.cyclePath).toEqual(['A', 'B', 'A']);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error?.code).toBe('CYCLE_DETECTED');
    expect(result.error?.message).toBe('Cycle detected: A -> B -> A');
  });

  it('should not repair cycles', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['C'] }, { id: 'B', deps: ['A'] }, { id: 'C', deps: ['B'] }]);

    const result = validateDependencies(workflow);

    expect(result.cyclePath).toEqual(['A', 'C', 'B', 'A']);
    expect(workflow.tasks.get('A')?.dependencies).toEqual(['C']);
    expect(workflow.tasks.get('B')?.dependencies).toEqual(['A']);
    expect(workflow.tasks.get('C')?.dependencies).toEqual(['B']);
  });

  it('should detect a cycle that only appears after pruning', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['A', 'B'] }, { id: 'B', deps: ['A', 'missing'] }]);

    const result = validateDependencies(workflow);

    expect(result.ok).toBe(false);
    expect(result.modified).toBe(true);
    expect(result.cyclePath).toEqual(['A', 'B', 'A']);
  });

  describe('strict mode', () => {
    it('should fail on the first degenerate edge without pruning', () => {
      const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A', 'A'] }, { id: 'C', deps: ['C'] }]);

      const result = validateDependencies(workflow, { mode: 'strict' });

      expect(result.ok).toBe(false);
      expect(result.modified).toBe(false);
      expect(result.error?.code).toBe('DUPLICATE_DEPENDENCY');
      expect(result.error?.message).toBe('Task B lists dependency A more than once');
      expect(workflow.tasks.get('B')?.dependencies).toEqual(['A', 'A']);
      expect(workflow.tasks.get('C')?.dependencies).toEqual(['C']);
    });

    it('should report missing dependencies', () => {
      const workflow = makeWorkflow([{ id: 'A', deps: ['nope'] }]);

      const result = validateDependencies(workflow, { mode: 'strict' });

      expect(result.error?.code).toBe('MISSING_DEPENDENCY');
      expect(result.error?.details).toEqual({ taskId: 'A', dependencyId: 'nope' });
    });

    it('should accept a clean DAG', () => {
      const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A'] }]);

      expect(validateDependencies(workflow, { mode: 'strict' }).ok).toBe(true);
    });
  });
});

describe('findCyclePath', () => {
  it('should return undefined for an acyclic graph', () => {
    const workflow = makeWorkflow([{ id: 'A' }, { id: 'B', deps: ['A'] }]);
    expect(findCyclePath(workflow.tasks)).toBeUndefined();
  });

  it('should follow dependencies in stored order', () => {
    const workflow = makeWorkflow([
      { id: 'A', deps: ['B', 'C'] },
      { id: 'B' },
      { id: 'C', deps: ['A'] },
    ]);
    expect(findCyclePath(workflow.tasks)).toEqual(['A', 'C', 'A']);
  });
});

describe('topologicalLayers', () => {
  it('should group tasks into dependency layers in map order', () => {
    const workflow = makeWorkflow([
      { id: 'D', deps: ['B', 'C'] },
      { id: 'A' },
      { id: 'B', deps: ['A'] },
      { id: 'C', deps: ['A'] },
      { id: 'E' },
    ]);

    expect(topologicalLayers(workflow)).toEqual([['A', 'E'], ['B', 'C'], ['D']]);
  });

  it('should throw ValidationError on a cyclic graph', () => {
    const workflow = makeWorkflow([{ id: 'A', deps: ['B'] }, { id: 'B', deps: ['A'] }]);

    expect(() => topologicalLayers(workflow)).toThrow(ValidationError);
  });
});
