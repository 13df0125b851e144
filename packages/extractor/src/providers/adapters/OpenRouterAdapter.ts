import { ConfigError } from '../../errors';
import { toDataUrl } from '../../image/ImageEncoder';
import { detectMimeType } from '../../image/mime';
import type { OpenRouterConfig, ProviderConfig } from '../../types';
import { isRecord } from '../../utils';
import { readChatCompletion, requestJson } from '../http';
import type { ConnectionCheck, ProviderAdapter } from '../ProviderAdapter';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/** Attribution headers read by OpenRouter's routing layer */
export const OPENROUTER_APP_HEADERS = {
  'HTTP-Referer': 'http://localhost/invoice-ledger',
  'X-Title': 'Invoice Ledger',
} as const;

const CONNECTION_TIMEOUT_MS = 10_000;

export interface OpenRouterModel {
  id: string;
  name: string;
}

/**
 * OpenRouter chat completions
 *
 * OpenRouter rejects images whose data URL type does not match the content,
 * so the MIME type is taken from the bytes themselves.
 */
export class OpenRouterAdapter implements ProviderAdapter {
  readonly kind = 'openrouter';
  readonly displayName = 'OpenRouter';

  validate(config: ProviderConfig): void {
    this.narrow(config);
  }

  async extract(imageBytes: Uint8Array, mimeType: string, prompt: string, config: ProviderConfig): Promise<string> {
    const openrouter = this.narrow(config);
    const contentType = detectMimeType(imageBytes) ?? mimeType;

    const data = await requestJson(`${OPENROUTER_BASE_URL}/chat/completions`, {
      provider: this.kind,
      timeoutMs: openrouter.timeoutMs,
      headers: {
        Authorization: `Bearer ${openrouter.apiKey}`,
        ...OPENROUTER_APP_HEADERS,
      },
      body: {
        model: openrouter.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              { type: 'image_url', image_url: { url: toDataUrl(imageBytes, contentType) } },
            ],
          },
        ],
      },
    });

    return readChatCompletion(data, this.kind);
  }

  async checkConnection(config: ProviderConfig): Promise<ConnectionCheck> {
    const models = await this.listModels(config);
    return {
      ok: true,
      message: `OpenRouter reachable, ${models.length} models available`,
      models: models.map((model) => model.id),
    };
  }

  /**
   * Models with a non-zero context window, sorted by display name
   */
  async listModels(config: ProviderConfig): Promise<OpenRouterModel[]> {
    const openrouter = this.narrow(config);
    const data = await requestJson(`${OPENROUTER_BASE_URL}/models`, {
      provider: this.kind,
      method: 'GET',
      timeoutMs: CONNECTION_TIMEOUT_MS,
      headers: { Authorization: `Bearer ${openrouter.apiKey}` },
    });

    const entries: unknown[] = isRecord(data) && Array.isArray(data.data) ? data.data : [];
    const models: OpenRouterModel[] = [];

    for (const entry of entries) {
      if (!isRecord(entry) || typeof entry.id !== 'string' || !entry.id) continue;
      const contextLength = typeof entry.context_length === 'number' ? entry.context_length : 0;
      if (contextLength <= 0) continue;
      models.push({ id: entry.id, name: typeof entry.name === 'string' ? entry.name : entry.id });
    }

    return models.sort((a, b) => a.name.localeCompare(b.name));
  }

  private narrow(config: ProviderConfig): OpenRouterConfig {
    if (config.kind !== 'openrouter') {
      throw new ConfigError(`OpenRouter adapter received a ${config.kind} configuration`);
    }
    if (!config.apiKey.trim()) {
      throw new ConfigError('OpenRouter API key is required');
    }
    if (!config.model.trim()) {
      throw new ConfigError('OpenRouter model is required');
    }
    return config;
  }
}
