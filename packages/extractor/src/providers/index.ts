import type { ProviderKind } from '../types';
import { OllamaAdapter } from './adapters/OllamaAdapter';
import { OpenRouterAdapter } from './adapters/OpenRouterAdapter';
import { VolcengineAdapter } from './adapters/VolcengineAdapter';
import type { ProviderAdapter } from './ProviderAdapter';

const adapters: Record<ProviderKind, ProviderAdapter> = {
  ollama: new OllamaAdapter(),
  volcengine: new VolcengineAdapter(),
  openrouter: new OpenRouterAdapter(),
};

export const PROVIDER_KINDS: readonly ProviderKind[] = ['ollama', 'volcengine', 'openrouter'];

export function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === 'string' && PROVIDER_KINDS.some((kind) => kind === value);
}

/**
 * Adapter for a provider kind. Adapters are stateless and shared.
 */
export function createProvider(kind: ProviderKind): ProviderAdapter {
  return adapters[kind];
}

export type { ConnectionCheck, ProviderAdapter } from './ProviderAdapter';
export { OllamaAdapter } from './adapters/OllamaAdapter';
export { OpenRouterAdapter, OPENROUTER_APP_HEADERS, OPENROUTER_BASE_URL } from './adapters/OpenRouterAdapter';
export type { OpenRouterModel } from './adapters/OpenRouterAdapter';
export { VolcengineAdapter, VOLCENGINE_CHAT_URL } from './adapters/VolcengineAdapter';
export {
  createProviderConfig,
  describeProvider,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
  OLLAMA_DEFAULTS,
  OPENROUTER_DEFAULT_MODEL,
} from './config';
export type { ProviderConfigInput } from './config';
export { parseRetryAfter, requestJson, readChatCompletion } from './http';
