import { ConversationMessage } from '../../core/types';
import { ModelGateway } from './ModelGateway';

/** Offline gateway that answers without a model; handy for demos and wiring checks. */
export class MockGateway implements ModelGateway {
  readonly provider = 'mock';
  readonly model: string;

  constructor(model: string = 'mock') {
    this.model = model;
  }

  async send(conversation: ConversationMessage[]): Promise<string> {
    const last = conversation[conversation.length - 1]?.content ?? '';
    if (last.toLowerCase().includes('hello')) {
      return 'Hello! How can I help you?';
    }
    return `Mock response to: ${last.slice(0, 50)}...`;
  }
}
