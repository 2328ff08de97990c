import { ConversationMessage } from '../../core/types';

export interface SendOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Turns an ordered conversation into one assistant reply. Implementations
 * reject with TransportError when no reply can be obtained.
 */
export interface ModelGateway {
  readonly provider: string;
  readonly model: string;
  send(conversation: ConversationMessage[], options?: SendOptions): Promise<string>;
}
