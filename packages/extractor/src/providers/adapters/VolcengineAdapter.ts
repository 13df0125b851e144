import { ConfigError } from '../../errors';
import { toDataUrl } from '../../image/ImageEncoder';
import type { ProviderConfig, VolcengineConfig } from '../../types';
import { readChatCompletion, requestJson } from '../http';
import type { ConnectionCheck, ProviderAdapter } from '../ProviderAdapter';

export const VOLCENGINE_CHAT_URL = 'https://ark.cn-beijing.volces.com/api/v3/chat/completions';

/**
 * Volcengine Ark vision models (OpenAI-compatible chat completions)
 *
 * Ark routes requests by inference endpoint id (`ep-...`), which goes into
 * the body's `model` field. The configured model name is informational only.
 */
export class VolcengineAdapter implements ProviderAdapter {
  readonly kind = 'volcengine';
  readonly displayName = 'Volcengine Ark';

  validate(config: ProviderConfig): void {
    this.narrow(config);
  }

  async extract(imageBytes: Uint8Array, mimeType: string, prompt: string, config: ProviderConfig): Promise<string> {
    const volcengine = this.narrow(config);

    const data = await requestJson(VOLCENGINE_CHAT_URL, {
      provider: this.kind,
      timeoutMs: volcengine.timeoutMs,
      headers: { Authorization: `Bearer ${volcengine.apiKey}` },
      body: {
        model: volcengine.endpointId,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              { type: 'image_url', image_url: { url: toDataUrl(imageBytes, mimeType) } },
            ],
          },
        ],
      },
    });

    return readChatCompletion(data, this.kind);
  }

  async checkConnection(config: ProviderConfig): Promise<ConnectionCheck> {
    const volcengine = this.narrow(config);
    // Ark has no free listing endpoint; only the credentials are checked
    return {
      ok: true,
      message: `Credentials present for endpoint ${volcengine.endpointId} (no request sent)`,
    };
  }

  private narrow(config: ProviderConfig): VolcengineConfig {
    if (config.kind !== 'volcengine') {
      throw new ConfigError(`Volcengine adapter received a ${config.kind} configuration`);
    }
    if (!config.endpointId.trim()) {
      throw new ConfigError(
        'Volcengine endpoint id is empty: set the inference endpoint id (ep-...), not only the model name'
      );
    }
    if (!config.apiKey.trim()) {
      throw new ConfigError('Volcengine API key is required');
    }
    return config;
  }
}
