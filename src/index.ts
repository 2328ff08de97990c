import { join } from 'path';
import { AgentweaveConfig, loadConfig } from './config';
import { createGateway } from './llm/gateway';
import { ModelGateway } from './llm/gateway/ModelGateway';
import { Agent } from './agents/core/Agent';
import { ToolCatalog } from './tools/registry/ToolCatalog';
import { MemoryManager } from './knowledge/memory/MemoryManager';
import { Orchestrator } from './tasks/scheduler/Orchestrator';
import { Telemetry, createTelemetry } from './monitoring/core/Monitoring';

export * from './core/types';
export * from './core/errors';
export { loadConfig, getStatus, DEFAULT_GATEWAY_CONFIG } from './config';
export type { AgentweaveConfig, GatewayConfig, ProviderName, AgentDefaults } from './config';
export { LogAggregator, MetricsCollector, createTelemetry } from './monitoring/core/Monitoring';
export type { Telemetry, LogQuery, HistogramStats } from './monitoring/core/Monitoring';
export { ToolCatalog } from './tools/registry/ToolCatalog';
export { createBuiltinTools } from './tools/builtin';
export { evaluateExpression } from './tools/builtin/calculator';
export { createGateway, MockGateway, OpenAICompatibleGateway, PROVIDER_URLS } from './llm/gateway';
export type { ModelGateway, SendOptions } from './llm/gateway';
export {
  ReactResponseParser,
  JsonResponseParser,
  createResponseParser,
  extractJsonObject,
  FINISH_ACTION,
  RAW_INPUT_KEY,
} from './agents/parser/ResponseParser';
export type { ResponseParser } from './agents/parser/ResponseParser';
export { Agent, EXHAUSTED_FALLBACK, EMPTY_RUN_FALLBACK, CHAT_FALLBACK } from './agents/core/Agent';
export type { AgentOptions, AgentEvents } from './agents/core/Agent';
export { MemoryManager, LONG_TERM_THRESHOLD } from './knowledge/memory/MemoryManager';
export type { MemorySnapshot } from './knowledge/memory/MemoryManager';
export { TaskGraph } from './tasks/graph/TaskGraph';
export {
  Orchestrator,
  DEPENDENCIES_NOT_MET,
  NO_AGENTS_AVAILABLE,
  DEBATE_NEEDS_TWO_AGENTS,
} from './tasks/scheduler/Orchestrator';
export type { TaskAgent, OrchestratorOptions, OrchestratorStatus, CreateAgentOptions } from './tasks/scheduler/Orchestrator';
export { parseWorkflowDefinition } from './workflows/definition/WorkflowLoader';
export type { WorkflowDefinition, TaskDefinition } from './workflows/definition/WorkflowLoader';

export interface Runtime {
  config: AgentweaveConfig;
  gateway: ModelGateway;
  telemetry: Telemetry;
  orchestrator: Orchestrator;
  /** Builds an agent wired to this runtime's gateway, logger and configured defaults. */
  createAgent(name: string, role: string, options?: { tools?: ToolCatalog }): Agent;
  memoryPath(agentName: string): string;
  /** Writes every runtime-created agent's memory under the configured storage path. */
  persistMemory(): void;
}

/**
 * Composition root: reads configuration (environment by default) once and
 * wires gateway, telemetry and orchestrator together.
 */
export function createRuntime(config: AgentweaveConfig = loadConfig()): Runtime {
  const telemetry = createTelemetry({ level: config.logging.level });
  const gateway = createGateway(config.llm);
  const orchestrator = new Orchestrator({ gateway, telemetry });
  const memories = new Map<string, MemoryManager>();
  const memoryPath = (agentName: string): string => join(config.memory.storagePath, `${agentName}.json`);

  return {
    config,
    gateway,
    telemetry,
    orchestrator,
    memoryPath,
    createAgent(name, role, options = {}) {
      const memory = new MemoryManager();
      memory.load(memoryPath(name));
      memories.set(name, memory);
      return orchestrator.createAgent({
        name,
        role,
        tools: options.tools ?? ToolCatalog.withBuiltins(),
        memory,
        maxSteps: config.agent.maxSteps,
        parsingStrategy: config.agent.parsingStrategy,
      });
    },
    persistMemory() {
      for (const [name, memory] of memories) {
        memory.save(memoryPath(name));
      }
    },
  };
}
