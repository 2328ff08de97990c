import dotenv from 'dotenv';
import { z } from 'zod';
import { LogLevel, ParsingStrategy } from '../core/types';
dotenv.config();

export type ProviderName = 'groq' | 'openai' | 'ollama' | 'mock';

export interface GatewayConfig {
  provider: ProviderName;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface AgentDefaults {
  maxSteps: number;
  parsingStrategy: ParsingStrategy;
}

export interface AgentweaveConfig {
  llm: GatewayConfig;
  agent: AgentDefaults;
  logging: { level: LogLevel };
  memory: { storagePath: string };
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  provider: 'groq',
  model: 'llama-3.3-70b-versatile',
  temperature: 0.7,
  maxTokens: 4096,
  timeoutMs: 60000,
};

const configSchema = z.object({
  llm: z.object({
    provider: z.enum(['groq', 'openai', 'ollama', 'mock']),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
  agent: z.object({
    maxSteps: z.number().int().positive(),
    parsingStrategy: z.enum(['react', 'json']),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
  memory: z.object({
    storagePath: z.string().min(1),
  }),
});

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string = ''): string {
  return env[key] || defaultValue;
}

function getOptional(env: Env, key: string): string | undefined {
  const val = env[key];
  return val ? val : undefined;
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const val = env[key];
  return val ? Number(val) : defaultValue;
}

/**
 * Builds the configuration from environment variables. This is the only place
 * the library reads the environment; everything downstream takes config objects.
 */
export function loadConfig(env: Env = process.env): AgentweaveConfig {
  const raw = {
    llm: {
      provider: getEnv(env, 'AGENTWEAVE_PROVIDER', DEFAULT_GATEWAY_CONFIG.provider),
      model: getEnv(env, 'AGENTWEAVE_MODEL', DEFAULT_GATEWAY_CONFIG.model),
      apiKey: getOptional(env, 'AGENTWEAVE_API_KEY'),
      baseUrl: getOptional(env, 'AGENTWEAVE_BASE_URL'),
      temperature: getNumber(env, 'AGENTWEAVE_TEMPERATURE', DEFAULT_GATEWAY_CONFIG.temperature),
      maxTokens: getNumber(env, 'AGENTWEAVE_MAX_TOKENS', DEFAULT_GATEWAY_CONFIG.maxTokens),
      timeoutMs: getNumber(env, 'AGENTWEAVE_TIMEOUT_MS', DEFAULT_GATEWAY_CONFIG.timeoutMs),
    },
    agent: {
      maxSteps: getNumber(env, 'AGENTWEAVE_MAX_STEPS', 10),
      parsingStrategy: getEnv(env, 'AGENTWEAVE_PARSER', 'react'),
    },
    logging: {
      level: getEnv(env, 'AGENTWEAVE_LOG_LEVEL', 'info'),
    },
    memory: {
      storagePath: getEnv(env, 'AGENTWEAVE_MEMORY_PATH', 'memory_store'),
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error('Invalid configuration: ' + issues);
  }
  return parsed.data;
}

export function getStatus(config: AgentweaveConfig): {
  provider: ProviderName;
  model: string;
  apiKeyConfigured: boolean;
  baseUrl?: string;
} {
  return {
    provider: config.llm.provider,
    model: config.llm.model,
    apiKeyConfigured: !!config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
  };
}
