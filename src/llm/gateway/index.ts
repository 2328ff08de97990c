import { GatewayConfig } from '../../config';
import { ModelGateway } from './ModelGateway';
import { MockGateway } from './MockGateway';
import { OpenAICompatibleGateway } from './OpenAICompatibleGateway';

export * from './ModelGateway';
export { MockGateway } from './MockGateway';
export { OpenAICompatibleGateway, PROVIDER_URLS } from './OpenAICompatibleGateway';

export function createGateway(config: GatewayConfig): ModelGateway {
  if (config.provider === 'mock') {
    return new MockGateway(config.model);
  }
  return new OpenAICompatibleGateway(config);
}
