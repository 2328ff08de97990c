import { Task, TaskStatus } from '../../core/types';
import { InvalidTransitionError } from '../../core/errors';

export const DEPENDENCY_RESULT_LIMIT = 500;

export interface NewTask {
  id: string;
  description: string;
  assignedAgent?: string;
  dependencies?: string[];
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Tasks keyed by id, in registration order. Status only moves forward:
 * pending → running → completed | failed, or pending → failed when a task is
 * rejected before it starts.
 */
export class TaskGraph {
  private tasks: Map<string, Task> = new Map();
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  add(config: NewTask): Task {
    const task: Task = {
      id: config.id,
      description: config.description,
      assignedAgent: config.assignedAgent,
      status: 'pending',
      dependencies: [...(config.dependencies ?? [])],
      createdAt: this.now(),
    };
    this.tasks.set(task.id, task);
    return task;
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  ids(): string[] {
    return Array.from(this.tasks.keys());
  }

  all(): Task[] {
    return Array.from(this.tasks.values());
  }

  get size(): number {
    return this.tasks.size;
  }

  clear(): void {
    this.tasks.clear();
  }

  canRun(task: Task): boolean {
    return task.dependencies.every(depId => this.tasks.get(depId)?.status === 'completed');
  }

  /** Dependencies that are missing or not completed, in declared order. */
  unmetDependencies(task: Task): string[] {
    return task.dependencies.filter(depId => this.tasks.get(depId)?.status !== 'completed');
  }

  dependencyContext(task: Task): string {
    if (task.dependencies.length === 0) return '';

    const parts = ['Previous results:'];
    for (const depId of task.dependencies) {
      const result = this.tasks.get(depId)?.result;
      if (result) {
        parts.push(`- [${depId}]: ${result.slice(0, DEPENDENCY_RESULT_LIMIT)}`);
      }
    }
    return parts.join('\n');
  }

  markRunning(task: Task, agentName: string): void {
    this.transition(task, 'running');
    task.assignedAgent = agentName;
  }

  markCompleted(task: Task, result: string): void {
    this.transition(task, 'completed');
    task.result = result;
    task.completedAt = this.now();
  }

  markFailed(task: Task, reason: string): void {
    this.transition(task, 'failed');
    task.result = reason;
    task.completedAt = this.now();
  }

  private transition(task: Task, to: TaskStatus): void {
    if (!ALLOWED_TRANSITIONS[task.status].includes(to)) {
      throw new InvalidTransitionError(task.id, task.status, to);
    }
    task.status = to;
  }
}
