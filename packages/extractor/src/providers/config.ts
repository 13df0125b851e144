import { ConfigError } from '../errors';
import type { OllamaConfig, OpenRouterConfig, ProviderConfig, VolcengineConfig } from '../types';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_TIMEOUT_MS = 120_000;

export const OLLAMA_DEFAULTS = {
  host: 'localhost',
  port: 11434,
  model: 'qwen3-vl:8b',
} as const;

export const OPENROUTER_DEFAULT_MODEL = 'google/gemini-2.0-flash-exp:free';

type Optional<T, K extends keyof T> = Omit<T, K> & Partial<Pick<T, K>>;

type Retryable = 'maxRetries' | 'timeoutMs';

export type ProviderConfigInput =
  | Optional<OllamaConfig, Retryable | 'host' | 'port' | 'model'>
  | Optional<VolcengineConfig, Retryable | 'model'>
  | Optional<OpenRouterConfig, Retryable | 'model'>;

function checkLimits(maxRetries: number, timeoutMs: number): void {
  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new ConfigError(`maxRetries must be an integer >= 1, got ${maxRetries}`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`timeoutMs must be positive, got ${timeoutMs}`);
  }
}

/**
 * Build the immutable provider configuration for one batch.
 *
 * Fills defaults and trims strings. Provider-specific requirements
 * (endpoint id, API key) are checked by the adapter's validate().
 */
export function createProviderConfig(input: ProviderConfigInput): ProviderConfig {
  const maxRetries = input.maxRetries ?? DEFAULT_MAX_RETRIES;
  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  checkLimits(maxRetries, timeoutMs);

  switch (input.kind) {
    case 'ollama': {
      const config: OllamaConfig = {
        kind: 'ollama',
        host: (input.host ?? OLLAMA_DEFAULTS.host).trim(),
        port: input.port ?? OLLAMA_DEFAULTS.port,
        model: (input.model ?? OLLAMA_DEFAULTS.model).trim(),
        maxRetries,
        timeoutMs,
      };
      return Object.freeze(config);
    }

    case 'volcengine': {
      const config: VolcengineConfig = {
        kind: 'volcengine',
        apiKey: input.apiKey.trim(),
        endpointId: input.endpointId.trim(),
        model: (input.model ?? '').trim(),
        maxRetries,
        timeoutMs,
      };
      return Object.freeze(config);
    }

    case 'openrouter': {
      const config: OpenRouterConfig = {
        kind: 'openrouter',
        apiKey: input.apiKey.trim(),
        model: (input.model ?? OPENROUTER_DEFAULT_MODEL).trim(),
        maxRetries,
        timeoutMs,
      };
      return Object.freeze(config);
    }
  }
}

/** Human-readable model label for logs and reports */
export function describeProvider(config: ProviderConfig): string {
  switch (config.kind) {
    case 'ollama':
      return `ollama ${config.model} @ ${config.host}:${config.port}`;
    case 'volcengine':
      return `volcengine ${config.model || config.endpointId}`;
    case 'openrouter':
      return `openrouter ${config.model}`;
  }
}
