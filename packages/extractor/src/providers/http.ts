import {
  AuthError,
  ConfigError,
  EmptyResponseError,
  NetworkError,
  RateLimitError,
  TimeoutError,
  errorMessage,
} from '../errors';
import type { ProviderKind } from '../types';
import { isRecord } from '../utils';

export interface RequestOptions {
  provider: ProviderKind;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

const MAX_ERROR_BODY = 500;

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
  } catch {
    return '';
  }
}

/**
 * Map a non-2xx response onto the provider error taxonomy
 */
async function toHttpError(response: Response, provider: ProviderKind): Promise<Error> {
  const body = await readErrorBody(response);
  const message = `${provider} HTTP ${response.status}${body ? `: ${body}` : ''}`;
  const options = { provider, status: response.status };

  if (response.status === 401 || response.status === 403) {
    return new AuthError(message, options);
  }
  if (response.status === 429) {
    return new RateLimitError(message, {
      ...options,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }
  if (response.status >= 500) {
    return new NetworkError(message, options);
  }
  // Remaining 4xx: unknown model or endpoint, malformed request
  return new ConfigError(message);
}

/**
 * Perform a JSON request and return the decoded body.
 * Every failure is rethrown as a provider error.
 */
export async function requestJson(url: string, options: RequestOptions): Promise<unknown> {
  const { provider, timeoutMs } = options;
  let response: Response;

  try {
    response = await fetch(url, {
      method: options.method ?? 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new TimeoutError(`${provider} request timed out after ${timeoutMs}ms`, { provider, cause: error });
    }
    throw new NetworkError(`${provider} network error: ${errorMessage(error)}`, { provider, cause: error });
  }

  if (!response.ok) {
    throw await toHttpError(response, provider);
  }

  try {
    return await response.json();
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new TimeoutError(`${provider} response timed out after ${timeoutMs}ms`, { provider, cause: error });
    }
    throw new NetworkError(`${provider} returned an invalid JSON body`, {
      provider,
      status: response.status,
      cause: error,
    });
  }
}

/**
 * Content of the first choice of an OpenAI-compatible chat completion
 */
export function readChatCompletion(data: unknown, provider: ProviderKind): string {
  const choices = isRecord(data) ? data.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  let text = '';
  if (typeof content === 'string') {
    text = content;
  } else if (Array.isArray(content)) {
    // Some models answer with content parts
    text = content
      .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
      .join('');
  }

  if (!text.trim()) {
    const detail = isRecord(data) && isRecord(data.error) ? `: ${String(data.error.message ?? '')}` : '';
    throw new EmptyResponseError(`${provider} returned empty content${detail}`, { provider });
  }

  return text;
}
