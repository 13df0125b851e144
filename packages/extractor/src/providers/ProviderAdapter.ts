import type { ProviderConfig, ProviderKind } from '../types';

export interface ConnectionCheck {
  ok: boolean;
  message: string;
  /** Models the provider reports, when it lists them */
  models?: string[];
}

/**
 * Vision provider contract
 *
 * One instance per provider kind. Implementations build the provider's own
 * request and reject only with the unified error taxonomy
 * (NetworkError, TimeoutError, AuthError, RateLimitError,
 * EmptyResponseError, ConfigError).
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  readonly displayName: string;

  /** Throws ConfigError when the configuration cannot work; never touches the network */
  validate(config: ProviderConfig): void;

  extract(imageBytes: Uint8Array, mimeType: string, prompt: string, config: ProviderConfig): Promise<string>;

  checkConnection(config: ProviderConfig): Promise<ConnectionCheck>;
}
