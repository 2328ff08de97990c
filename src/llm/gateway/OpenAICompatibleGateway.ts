import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConversationMessage } from '../../core/types';
import { TransportError, errorMessage } from '../../core/errors';
import { GatewayConfig } from '../../config';
import { ModelGateway, SendOptions } from './ModelGateway';

export const PROVIDER_URLS: Record<'groq' | 'openai' | 'ollama', string> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: 'https://api.openai.com/v1',
  ollama: 'http://localhost:11434/v1',
};

interface ChatRequest {
  model: string;
  messages: ConversationMessage[];
  temperature: number;
  max_tokens: number;
}

const chatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable().optional(),
    }),
  })).min(1),
});

export interface OpenAICompatibleGatewayOptions {
  /** Swaps the HTTP transport; used to keep tests in-process. */
  adapter?: AxiosAdapter;
}

export class OpenAICompatibleGateway implements ModelGateway {
  private client: AxiosInstance;
  private config: GatewayConfig;

  constructor(config: GatewayConfig, options: OpenAICompatibleGatewayOptions = {}) {
    this.config = config;
    this.client = axios.create({
      baseURL: config.baseUrl ?? PROVIDER_URLS[config.provider === 'mock' ? 'openai' : config.provider],
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { 'Authorization': `Bearer ${config.apiKey}` } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  get provider(): string {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getBaseUrl(): string | undefined {
    return this.client.defaults.baseURL;
  }

  async send(conversation: ConversationMessage[], options: SendOptions = {}): Promise<string> {
    const request: ChatRequest = {
      model: this.config.model,
      messages: conversation.map(m => ({ role: m.role, content: m.content })),
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokens,
    };

    let data: unknown;
    try {
      const response = await this.client.post('/chat/completions', request);
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TransportError(`Model request timed out after ${this.config.timeoutMs}ms`, undefined, { cause: error });
        }
        throw new TransportError(`Model API error: ${error.message}`, error.response?.status, { cause: error });
      }
      throw new TransportError(`Model API error: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError('Malformed model response: ' + parsed.error.issues.map(i => i.message).join('; '));
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }
}
