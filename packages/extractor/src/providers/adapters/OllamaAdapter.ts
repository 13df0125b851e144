import { ConfigError, EmptyResponseError } from '../../errors';
import { toBase64 } from '../../image/ImageEncoder';
import type { OllamaConfig, ProviderConfig } from '../../types';
import { isRecord } from '../../utils';
import { requestJson } from '../http';
import type { ConnectionCheck, ProviderAdapter } from '../ProviderAdapter';

const CONNECTION_TIMEOUT_MS = 5000;

/**
 * Ollama chat API on a local or LAN host
 */
export class OllamaAdapter implements ProviderAdapter {
  readonly kind = 'ollama';
  readonly displayName = 'Ollama';

  validate(config: ProviderConfig): void {
    this.narrow(config);
  }

  async extract(imageBytes: Uint8Array, _mimeType: string, prompt: string, config: ProviderConfig): Promise<string> {
    const ollama = this.narrow(config);

    const data = await requestJson(`${this.baseUrl(ollama)}/api/chat`, {
      provider: this.kind,
      timeoutMs: ollama.timeoutMs,
      body: {
        model: ollama.model,
        messages: [
          {
            role: 'user',
            content: prompt,
            images: [toBase64(imageBytes)],
          },
        ],
        stream: false,
      },
    });

    const message = isRecord(data) ? data.message : undefined;
    const content = isRecord(message) ? message.content : undefined;

    if (typeof content !== 'string' || !content.trim()) {
      const detail = isRecord(data) && typeof data.error === 'string' ? `: ${data.error}` : '';
      throw new EmptyResponseError(`ollama returned empty content${detail}`, { provider: this.kind });
    }

    return content;
  }

  async checkConnection(config: ProviderConfig): Promise<ConnectionCheck> {
    const ollama = this.narrow(config);
    const data = await requestJson(`${this.baseUrl(ollama)}/api/tags`, {
      provider: this.kind,
      method: 'GET',
      timeoutMs: CONNECTION_TIMEOUT_MS,
    });

    const models = isRecord(data) && Array.isArray(data.models)
      ? data.models
          .map((model: unknown) => (isRecord(model) && typeof model.name === 'string' ? model.name : ''))
          .filter((name) => name !== '')
      : [];

    return {
      ok: true,
      message: models.length > 0
        ? `Connected to Ollama at ${ollama.host}:${ollama.port}`
        : `Connected to Ollama at ${ollama.host}:${ollama.port}, but no models are installed`,
      models,
    };
  }

  private baseUrl(config: OllamaConfig): string {
    return `http://${config.host}:${config.port}`;
  }

  private narrow(config: ProviderConfig): OllamaConfig {
    if (config.kind !== 'ollama') {
      throw new ConfigError(`Ollama adapter received a ${config.kind} configuration`);
    }
    if (!config.host.trim()) {
      throw new ConfigError('Ollama host is required');
    }
    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
      throw new ConfigError(`Invalid Ollama port: ${config.port}`);
    }
    if (!config.model.trim()) {
      throw new ConfigError('Ollama model is required');
    }
    return config;
  }
}
