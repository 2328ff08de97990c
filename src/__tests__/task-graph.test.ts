import { describe, it, expect, beforeEach } from '@jest/globals';
import { InvalidTransitionError } from '../core/errors';
import { DEPENDENCY_RESULT_LIMIT, TaskGraph } from '../tasks/graph/TaskGraph';

describe('TaskGraph', () => {
  const created = new Date('2024-03-01T10:00:00.000Z');
  let graph: TaskGraph;

  beforeEach(() => {
    graph = new TaskGraph(() => created);
  });

  it('adds pending tasks in registration order', () => {
    const task = graph.add({ id: 'b', description: 'second', dependencies: ['a'] });
    graph.add({ id: 'a', description: 'first' });

    expect(task).toEqual({
      id: 'b',
      description: 'second',
      assignedAgent: undefined,
      status: 'pending',
      dependencies: ['a'],
      createdAt: created,
    });
    expect(graph.ids()).toEqual(['b', 'a']);
    expect(graph.size).toBe(2);
  });

  it('can run a task only when every dependency completed', () => {
    const first = graph.add({ id: 'first', description: 'x' });
    const second = graph.add({ id: 'second', description: 'y', dependencies: ['first', 'ghost'] });

    expect(graph.canRun(first)).toBe(true);
    expect(graph.canRun(second)).toBe(false);
    expect(graph.unmetDependencies(second)).toEqual(['first', 'ghost']);

    graph.markRunning(first, 'A');
    graph.markCompleted(first, 'done');

    expect(graph.unmetDependencies(second)).toEqual(['ghost']);
  });

  it('moves status forward only', () => {
    const task = graph.add({ id: 't1', description: 'x' });

    graph.markRunning(task, 'writer');
    expect(task.assignedAgent).toBe('writer');
    graph.markCompleted(task, 'result');
    expect(task.completedAt).toEqual(created);

    expect(() => graph.markRunning(task, 'writer')).toThrow(InvalidTransitionError);
    expect(() => graph.markFailed(task, 'late')).toThrow('Task t1 cannot move from completed to failed');
    expect(task.result).toBe('result');
  });

  it('allows failing a task before it starts', () => {
    const task = graph.add({ id: 't1', description: 'x' });
    graph.markFailed(task, 'Dependencies not met');

    expect(task.status).toBe('failed');
    expect(() => graph.markCompleted(task, 'x')).toThrow('Task t1 cannot move from failed to completed');
  });

  it('formats dependency results and truncates long ones', () => {
    const long = graph.add({ id: 'long', description: 'x' });
    const empty = graph.add({ id: 'empty', description: 'x' });
    const next = graph.add({ id: 'next', description: 'x', dependencies: ['long', 'empty'] });
    graph.markRunning(long, 'A');
    graph.markCompleted(long, 'y'.repeat(DEPENDENCY_RESULT_LIMIT + 20));
    graph.markRunning(empty, 'A');
    graph.markCompleted(empty, '');

    expect(graph.dependencyContext(next)).toBe(`Previous results:\n- [long]: ${'y'.repeat(DEPENDENCY_RESULT_LIMIT)}`);
    expect(graph.dependencyContext(long)).toBe('');
  });
});
