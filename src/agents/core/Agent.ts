import { EventEmitter } from 'events';
import { AgentState, AgentStep, ConversationMessage, MemoryContext, ParsingStrategy } from '../../core/types';
import { errorMessage } from '../../core/errors';
import { ToolCatalog } from '../../tools/registry/ToolCatalog';
import { ModelGateway } from '../../llm/gateway/ModelGateway';
import { MemoryManager } from '../../knowledge/memory/MemoryManager';
import { Telemetry, createTelemetry } from '../../monitoring/core/Monitoring';
import { ResponseParser, createResponseParser } from '../parser/ResponseParser';

export const EXHAUSTED_FALLBACK = 'Could not complete the task';
export const EMPTY_RUN_FALLBACK = 'No result';
export const CHAT_FALLBACK = "I couldn't generate a response.";

export interface AgentOptions {
  name?: string;
  role?: string;
  gateway: ModelGateway;
  tools?: ToolCatalog;
  memory?: MemoryContext;
  maxSteps?: number;
  parsingStrategy?: ParsingStrategy;
  telemetry?: Telemetry;
}

export interface AgentEvents {
  'agent:state': { agent: string; from: AgentState; to: AgentState };
  'agent:step': { agent: string; step: AgentStep };
}

/**
 * A single ReAct loop: ask the model, parse its reply, run the requested tool,
 * feed the observation back, until the model finishes or maxSteps runs out.
 * `run` always resolves to a string.
 */
export class Agent extends EventEmitter {
  readonly name: string;
  readonly role: string;
  readonly maxSteps: number;
  private gateway: ModelGateway;
  private tools: ToolCatalog;
  private memory: MemoryContext;
  private parser: ResponseParser;
  private telemetry: Telemetry;
  private history: AgentStep[] = [];
  private state: AgentState = 'thinking';

  constructor(options: AgentOptions) {
    super();
    const maxSteps = options.maxSteps ?? 10;
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new Error('maxSteps must be a positive integer, got ' + maxSteps);
    }

    this.name = options.name ?? 'Agent';
    this.role = options.role ?? 'A helpful AI assistant';
    this.maxSteps = maxSteps;
    this.gateway = options.gateway;
    this.tools = options.tools ?? new ToolCatalog();
    this.memory = options.memory ?? new MemoryManager();
    this.parser = createResponseParser(options.parsingStrategy ?? 'react');
    this.telemetry = options.telemetry ?? createTelemetry();
  }

  get parsingStrategy(): ParsingStrategy {
    return this.parser.strategy;
  }

  getState(): AgentState {
    return this.state;
  }

  getHistory(): AgentStep[] {
    return this.history.map(step => ({
      ...step,
      actionInput: step.actionInput ? { ...step.actionInput } : undefined,
    }));
  }

  getMemory(): MemoryContext {
    return this.memory;
  }

  getTools(): ToolCatalog {
    return this.tools;
  }

  async run(task: string): Promise<string> {
    const { logs, metrics } = this.telemetry;
    this.history = [];
    this.setState('thinking');
    logs.info('Agent run started', { agentId: this.name, task: task.slice(0, 200) });

    const conversation: ConversationMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      { role: 'user', content: task },
    ];
    this.memory.remember(`Task: ${task}`, 'task', 0.8);

    let endedEarly = false;
    for (let stepNumber = 1; stepNumber <= this.maxSteps; stepNumber++) {
      let reply: string;
      try {
        reply = await this.gateway.send(conversation);
      } catch (error) {
        logs.error('Model gateway failed, ending run early', { agentId: this.name, step: stepNumber, error: errorMessage(error) });
        endedEarly = true;
        break;
      }
      if (!reply.trim()) {
        logs.warn('Empty reply from model, ending run early', { agentId: this.name, step: stepNumber });
        endedEarly = true;
        break;
      }

      const parsed = this.parser.parse(reply, stepNumber);
      const step: AgentStep = !parsed.isFinal && parsed.action
        ? { ...parsed, observation: await this.act(parsed.action, parsed.actionInput ?? {}) }
        : parsed;
      this.record(step);

      if (step.isFinal) {
        const answer = step.finalAnswer ?? step.thought;
        this.memory.remember(`Completed: ${task} -> ${answer}`, 'task', 0.9);
        this.setState('done');
        logs.info('Agent produced final answer', { agentId: this.name, steps: stepNumber });
        metrics.recordHistogram('agent_run_steps', stepNumber, { agent: this.name });
        return answer;
      }

      conversation.push({ role: 'assistant', content: reply });
      if (step.observation !== undefined) {
        conversation.push({ role: 'user', content: `OBSERVATION: ${step.observation}\n\nContinue your reasoning.` });
      } else {
        this.setState('awaiting_retry');
        conversation.push({ role: 'user', content: this.parser.retryPrompt });
      }
      this.setState('thinking');
    }

    // `exhausted` only when the step budget ran out; an early exit settles in `done`.
    if (endedEarly) {
      this.setState('done');
    } else {
      this.setState('exhausted');
      logs.warn(`Max steps (${this.maxSteps}) reached without a final answer`, { agentId: this.name, steps: this.history.length });
    }
    metrics.recordHistogram('agent_run_steps', this.history.length, { agent: this.name });

    const last = this.history[this.history.length - 1];
    if (!last) return EMPTY_RUN_FALLBACK;
    return last.finalAnswer || last.thought || EXHAUSTED_FALLBACK;
  }

  async chat(message: string): Promise<string> {
    this.memory.remember(`User: ${message}`, 'conversation', 0.5);
    const context = this.memory.getContext();

    let reply = '';
    try {
      reply = await this.gateway.send([
        { role: 'system', content: `You are ${this.name}, ${this.role}.\n${context}` },
        { role: 'user', content: message },
      ]);
    } catch (error) {
      this.telemetry.logs.error('Model gateway failed during chat', { agentId: this.name, error: errorMessage(error) });
    }

    if (reply) {
      this.memory.remember(`Assistant: ${reply}`, 'conversation', 0.5);
    }
    return reply || CHAT_FALLBACK;
  }

  reset(): void {
    this.history = [];
    this.state = 'thinking';
    this.memory.clearShortTerm?.();
  }

  toJSON(): { name: string; role: string; tools: string[]; maxSteps: number; parsingStrategy: ParsingStrategy } {
    return {
      name: this.name,
      role: this.role,
      tools: this.tools.list(),
      maxSteps: this.maxSteps,
      parsingStrategy: this.parser.strategy,
    };
  }

  private buildSystemPrompt(): string {
    const sections = [
      `You are ${this.name}, ${this.role}.`,
      this.parser.formatInstructions(),
      this.tools.describe(),
    ];
    const context = this.memory.getContext();
    if (context) {
      sections.push(`Memory context:\n${context}`);
    }
    return sections.join('\n\n');
  }

  private async act(requested: string, args: Record<string, unknown>): Promise<string> {
    const { logs, metrics } = this.telemetry;
    this.setState('acting');

    const toolName = this.tools.has(requested) ? requested : requested.toLowerCase();
    let observation: string;
    if (!this.tools.has(toolName)) {
      observation = `Error: Tool '${requested}' not found. Available tools: ${this.tools.list().join(', ')}`;
      metrics.incrementCounter('tool_errors_total', { tool: requested });
      logs.warn('Model requested an unknown tool', { agentId: this.name, tool: requested });
    } else {
      const result = await this.tools.invoke(toolName, args);
      metrics.incrementCounter('tool_calls_total', { tool: toolName });
      if (result.success) {
        observation = `Result: ${result.output}`;
      } else {
        observation = `Error: ${result.error ?? 'unknown error'}`;
        metrics.incrementCounter('tool_errors_total', { tool: toolName });
      }
      logs.debug('Tool executed', { agentId: this.name, tool: toolName, success: result.success });
    }

    this.memory.remember(`Tool ${toolName}: ${observation.slice(0, 500)}`, 'tool_result', 0.5);
    return observation;
  }

  private record(step: AgentStep): void {
    this.history.push(step);
    this.telemetry.metrics.incrementCounter('agent_steps_total', { agent: this.name });
    const payload: AgentEvents['agent:step'] = { agent: this.name, step };
    this.emit('agent:step', payload);
  }

  private setState(to: AgentState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    const payload: AgentEvents['agent:state'] = { agent: this.name, from, to };
    this.emit('agent:state', payload);
  }
}
