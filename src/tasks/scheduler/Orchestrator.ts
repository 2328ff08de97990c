import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { Task, TaskStatus, WorkflowResult } from '../../core/types';
import { TaskExecutionError } from '../../core/errors';
import { Agent, AgentOptions } from '../../agents/core/Agent';
import { ModelGateway } from '../../llm/gateway/ModelGateway';
import { MemoryManager } from '../../knowledge/memory/MemoryManager';
import { Telemetry, createTelemetry } from '../../monitoring/core/Monitoring';
import { TaskGraph } from '../graph/TaskGraph';
import { WorkflowDefinition, parseWorkflowDefinition } from '../../workflows/definition/WorkflowLoader';

export const DEPENDENCIES_NOT_MET = 'Dependencies not met';
export const NO_AGENTS_AVAILABLE = 'No agents available';
export const DEBATE_NEEDS_TWO_AGENTS = 'Need at least 2 agents for debate';
export const NO_RESULTS_SUMMARY = 'No results to summarize';
export const SUMMARY_RESULT_LIMIT = 200;

/** Anything the orchestrator can hand a task to. */
export interface TaskAgent {
  readonly name: string;
  run(task: string): Promise<string>;
  reset?(): void;
}

export interface OrchestratorOptions {
  /** Gateway given to agents built through createAgent. */
  gateway?: ModelGateway;
  telemetry?: Telemetry;
  sharedMemory?: MemoryManager;
  now?: () => Date;
}

export type CreateAgentOptions = Omit<AgentOptions, 'gateway' | 'telemetry'> & {
  name: string;
  gateway?: ModelGateway;
};

export interface TaskSnapshot {
  id: string;
  description: string;
  agent?: string;
  status: TaskStatus;
  result?: string;
  dependencies: string[];
  createdAt: string;
  completedAt?: string;
}

export interface OrchestratorStatus {
  agents: string[];
  tasks: Record<string, TaskSnapshot>;
  workflowsCompleted: number;
}

export interface OrchestratorEvents {
  'task:started': { task: Task; agent: string };
  'task:completed': Task;
  'task:failed': { task: Task; reason: string };
  'workflow:completed': WorkflowResult;
}

/**
 * Runs named tasks across registered agents, one at a time, in the order the
 * caller gives. There is no topological sort: a task whose dependencies have
 * not completed by its turn is failed with DEPENDENCIES_NOT_MET. A failing
 * task never stops the rest of the schedule.
 */
export class Orchestrator extends EventEmitter {
  private agents: Map<string, TaskAgent> = new Map();
  private graph: TaskGraph;
  private gateway?: ModelGateway;
  private telemetry: Telemetry;
  private sharedMemory: MemoryManager;
  private workflowHistory: WorkflowResult[] = [];

  constructor(options: OrchestratorOptions = {}) {
    super();
    this.gateway = options.gateway;
    this.telemetry = options.telemetry ?? createTelemetry();
    this.sharedMemory = options.sharedMemory ?? new MemoryManager();
    this.graph = new TaskGraph(options.now);
  }

  // Agents

  addAgent(agent: TaskAgent): void {
    this.agents.set(agent.name, agent);
    this.telemetry.logs.info('Agent added', { agentId: agent.name });
  }

  createAgent(options: CreateAgentOptions): Agent {
    const gateway = options.gateway ?? this.gateway;
    if (!gateway) {
      throw new Error(`Cannot create agent ${options.name}: no model gateway configured`);
    }
    const agent = new Agent({ ...options, gateway, telemetry: this.telemetry });
    this.addAgent(agent);
    return agent;
  }

  getAgent(name: string): TaskAgent | undefined {
    return this.agents.get(name);
  }

  listAgents(): string[] {
    return Array.from(this.agents.keys());
  }

  removeAgent(name: string): boolean {
    return this.agents.delete(name);
  }

  // Tasks

  addTask(id: string, description: string, agentName?: string, dependencies: string[] = []): Task {
    return this.graph.add({ id, description, assignedAgent: agentName, dependencies });
  }

  getTask(id: string): Task | undefined {
    return this.graph.get(id);
  }

  getTaskGraph(): TaskGraph {
    return this.graph;
  }

  getSharedMemory(): MemoryManager {
    return this.sharedMemory;
  }

  loadWorkflow(definition: WorkflowDefinition): Task[] {
    this.graph.clear();
    return definition.tasks.map(t => this.addTask(t.id, t.description, t.agent, t.dependsOn));
  }

  async runWorkflow(source: string): Promise<WorkflowResult> {
    const definition = parseWorkflowDefinition(source);
    this.telemetry.logs.info('Workflow loaded', { workflow: definition.name, tasks: definition.tasks.length });
    this.loadWorkflow(definition);
    return this.runSequential();
  }

  // Workflow patterns

  async runSequential(taskIds?: string[]): Promise<WorkflowResult> {
    const { logs, metrics } = this.telemetry;
    const startedAt = Date.now();
    // An empty list means every registered task, same as omitting it.
    const ids = taskIds?.length ? taskIds : this.graph.ids();
    logs.info('Sequential workflow starting', { tasks: ids.length, agents: this.listAgents() });

    let completed = 0;
    let failed = 0;
    const finished: Array<[string, string]> = [];

    for (const id of ids) {
      const task = this.graph.get(id);
      if (!task) {
        logs.warn('Task not found', { taskId: id });
        failed++;
        continue;
      }

      if (task.status !== 'pending') {
        // Finished in an earlier run; statuses never go back to pending.
        if (task.status === 'completed') {
          completed++;
          finished.push([id, task.result ?? '']);
        } else {
          failed++;
        }
        continue;
      }

      if (!this.graph.canRun(task)) {
        logs.warn('Task dependencies not met', { taskId: id, unmet: this.graph.unmetDependencies(task) });
        this.fail(task, DEPENDENCIES_NOT_MET);
        failed++;
        continue;
      }

      if (await this.executeTask(task)) {
        completed++;
        finished.push([id, task.result ?? '']);
      } else {
        failed++;
      }
    }

    const durationSeconds = (Date.now() - startedAt) / 1000;
    const result: WorkflowResult = {
      id: uuidv4(),
      success: failed === 0,
      tasksCompleted: completed,
      tasksFailed: failed,
      totalTasks: ids.length,
      results: Object.fromEntries(finished),
      completedTaskIds: finished.map(([id]) => id),
      summary: this.generateSummary(finished),
      durationSeconds,
    };

    this.workflowHistory.push(result);
    metrics.incrementCounter('workflows_total', { outcome: result.success ? 'success' : 'failure' });
    metrics.recordHistogram('workflow_duration_seconds', durationSeconds);
    logs.info('Workflow complete', { workflowId: result.id, completed, failed, durationSeconds });
    const payload: OrchestratorEvents['workflow:completed'] = result;
    this.emit('workflow:completed', payload);

    return result;
  }

  async runPipeline(descriptions: string[], agentNames?: string[]): Promise<WorkflowResult> {
    this.telemetry.logs.info('Pipeline workflow starting', { steps: descriptions.length });
    this.graph.clear();

    descriptions.forEach((description, i) => {
      const deps = i > 0 ? [`step_${i}`] : [];
      this.addTask(`step_${i + 1}`, description, agentNames?.[i], deps);
    });

    return this.runSequential();
  }

  async runSingle(task: string, agentName?: string): Promise<string> {
    this.graph.clear();
    this.addTask('main', task, agentName);
    const result = await this.runSequential(['main']);
    return result.results['main'] ?? 'No result';
  }

  async runDebate(question: string, agentNames?: string[], rounds: number = 2): Promise<WorkflowResult> {
    const names = agentNames?.length ? agentNames : this.listAgents();
    this.telemetry.logs.info('Debate starting', { question: question.slice(0, 200), agents: names, rounds });

    if (names.length < 2) {
      return {
        id: uuidv4(),
        success: false,
        tasksCompleted: 0,
        tasksFailed: 1,
        totalTasks: 1,
        results: {},
        completedTaskIds: [],
        summary: DEBATE_NEEDS_TWO_AGENTS,
        durationSeconds: 0,
      };
    }

    this.graph.clear();
    let previous: string | null = null;

    for (let round = 1; round <= rounds; round++) {
      for (const name of names) {
        const id = `round${round}_${name}`;
        if (previous === null) {
          this.addTask(id, `Share your perspective on: ${question}\nYou are starting the debate.`, name);
        } else {
          this.addTask(
            id,
            `Continue the debate on: ${question}\nRespond to the previous arguments. Add new insights or respectfully counter.`,
            name,
            [previous],
          );
        }
        previous = id;
      }
    }

    return this.runSequential();
  }

  // Status

  getWorkflowHistory(): WorkflowResult[] {
    return [...this.workflowHistory];
  }

  getStatus(): OrchestratorStatus {
    const tasks: Record<string, TaskSnapshot> = {};
    for (const task of this.graph.all()) {
      tasks[task.id] = {
        id: task.id,
        description: task.description,
        agent: task.assignedAgent,
        status: task.status,
        result: task.result,
        dependencies: [...task.dependencies],
        createdAt: task.createdAt.toISOString(),
        completedAt: task.completedAt?.toISOString(),
      };
    }
    return {
      agents: this.listAgents(),
      tasks,
      workflowsCompleted: this.workflowHistory.length,
    };
  }

  reset(): void {
    this.graph.clear();
    for (const agent of this.agents.values()) {
      agent.reset?.();
    }
  }

  private resolveAgent(task: Task): TaskAgent | undefined {
    if (task.assignedAgent) {
      const assigned = this.agents.get(task.assignedAgent);
      if (assigned) return assigned;
    }
    // Unassigned or unknown: fall back to the first registered agent.
    const [first] = this.agents.values();
    return first;
  }

  private async executeTask(task: Task): Promise<boolean> {
    const { logs, metrics } = this.telemetry;
    const agent = this.resolveAgent(task);
    if (!agent) {
      this.fail(task, NO_AGENTS_AVAILABLE);
      return false;
    }

    this.graph.markRunning(task, agent.name);
    const started: OrchestratorEvents['task:started'] = { task, agent: agent.name };
    this.emit('task:started', started);
    logs.info('Running task', { taskId: task.id, agentId: agent.name });

    const context = this.graph.dependencyContext(task);
    const fullTask = context ? `${task.description}\n\n${context}` : task.description;

    let result: string;
    try {
      result = await agent.run(fullTask);
    } catch (error) {
      const failure = new TaskExecutionError(task.id, error);
      this.fail(task, `Error: ${failure.message}`);
      return false;
    }

    this.graph.markCompleted(task, result);
    this.sharedMemory.remember(`Task '${task.id}' completed: ${result.slice(0, SUMMARY_RESULT_LIMIT)}`, 'task', 0.8);
    metrics.incrementCounter('tasks_completed_total', { agent: agent.name });
    logs.info('Task completed', { taskId: task.id, agentId: agent.name });
    const payload: OrchestratorEvents['task:completed'] = task;
    this.emit('task:completed', payload);
    return true;
  }

  private fail(task: Task, reason: string): void {
    this.graph.markFailed(task, reason);
    this.telemetry.metrics.incrementCounter('tasks_failed_total');
    this.telemetry.logs.error('Task failed: ' + reason, { taskId: task.id });
    const payload: OrchestratorEvents['task:failed'] = { task, reason };
    this.emit('task:failed', payload);
  }

  private generateSummary(results: Array<[string, string]>): string {
    if (results.length === 0) return NO_RESULTS_SUMMARY;

    const parts = ['Workflow Summary:'];
    for (const [id, result] of results) {
      parts.push(`  [${id}]: ${result ? result.slice(0, SUMMARY_RESULT_LIMIT) : 'No output'}`);
    }
    return parts.join('\n');
  }
}
