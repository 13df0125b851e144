import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AuthError,
  ConfigError,
  EmptyResponseError,
  NetworkError,
  RateLimitError,
  TimeoutError,
} from '../../errors';
import {
  createProvider,
  createProviderConfig,
  isProviderKind,
  OllamaAdapter,
  OpenRouterAdapter,
  OPENROUTER_BASE_URL,
  parseRetryAfter,
  readChatCompletion,
  requestJson,
  VolcengineAdapter,
  VOLCENGINE_CHAT_URL,
} from '..';

const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);
const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function chatResponse(content: string): Response {
  return jsonResponse({ choices: [{ message: { role: 'assistant', content } }] });
}

function sentRequest(index = 0) {
  const [input, init] = fetchMock.mock.calls[index];
  const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body,
  };
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('provider registry', () => {
  it('should return the adapter for each kind', () => {
    expect(createProvider('ollama')).toBeInstanceOf(OllamaAdapter);
    expect(createProvider('volcengine')).toBeInstanceOf(VolcengineAdapter);
    expect(createProvider('openrouter')).toBeInstanceOf(OpenRouterAdapter);
  });

  it('should recognize provider kinds', () => {
    expect(isProviderKind('openrouter')).toBe(true);
    expect(isProviderKind('azure')).toBe(false);
    expect(isProviderKind(3)).toBe(false);
  });
});

describe('createProviderConfig', () => {
  it('should fill Ollama defaults and freeze the result', () => {
    const config = createProviderConfig({ kind: 'ollama' });

    expect(config).toEqual({
      kind: 'ollama',
      host: 'localhost',
      port: 11434,
      model: 'qwen3-vl:8b',
      maxRetries: 3,
      timeoutMs: 120_000,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should reject retry counts below one', () => {
    expect(() => createProviderConfig({ kind: 'ollama', maxRetries: 0 })).toThrow(ConfigError);
    expect(() => createProviderConfig({ kind: 'ollama', timeoutMs: -1 })).toThrow(ConfigError);
  });
});

describe('OllamaAdapter', () => {
  const adapter = new OllamaAdapter();
  const config = createProviderConfig({ kind: 'ollama', host: 'gpu-box', port: 11500, model: 'llava' });

  it('should post the prompt and base64 image to /api/chat', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant', content: '{"total": 12}' } }));

    const text = await adapter.extract(JPEG_BYTES, 'image/jpeg', 'read it', config);

    expect(text).toBe('{"total": 12}');
    const request = sentRequest();
    expect(request.url).toBe('http://gpu-box:11500/api/chat');
    expect(request.method).toBe('POST');
    expect(request.body).toEqual({
      model: 'llava',
      messages: [{ role: 'user', content: 'read it', images: ['/9j/4A=='] }],
      stream: false,
    });
  });

  it('should raise EmptyResponseError for blank content', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: { content: '  ' } }));

    await expect(adapter.extract(JPEG_BYTES, 'image/jpeg', 'read it', config)).rejects.toBeInstanceOf(
      EmptyResponseError
    );
  });

  it('should list installed models when checking the connection', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ models: [{ name: 'llava' }, { name: 'qwen3-vl:8b' }] }));

    const check = await adapter.checkConnection(config);

    expect(check).toEqual({
      ok: true,
      message: 'Connected to Ollama at gpu-box:11500',
      models: ['llava', 'qwen3-vl:8b'],
    });
    expect(sentRequest().url).toBe('http://gpu-box:11500/api/tags');
    expect(sentRequest().method).toBe('GET');
  });
});

describe('VolcengineAdapter', () => {
  const adapter = new VolcengineAdapter();

  it('should reject an empty endpoint id without a network call', async () => {
    const config = createProviderConfig({ kind: 'volcengine', apiKey: 'test-secret', endpointId: '  ' });

    expect(() => adapter.validate(config)).toThrow(ConfigError);
    await expect(adapter.extract(JPEG_BYTES, 'image/jpeg', 'read it', config)).rejects.toBeInstanceOf(ConfigError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should send the endpoint id as the model', async () => {
    const config = createProviderConfig({
      kind: 'volcengine',
      apiKey: 'test-secret',
      endpointId: 'ep-test',
      model: 'doubao-vision',
    });
    fetchMock.mockResolvedValueOnce(chatResponse('{"total": 5}'));

    await expect(adapter.extract(JPEG_BYTES, 'image/jpeg', 'read it', config)).resolves.toBe('{"total": 5}');

    const request = sentRequest();
    expect(request.url).toBe(VOLCENGINE_CHAT_URL);
    expect(request.headers.get('authorization')).toBe('Bearer test-secret');
    expect(request.body).toMatchObject({
      model: 'ep-test',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'read it' },
            { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,/9j/4A==' } },
          ],
        },
      ],
    });
  });
});

describe('OpenRouterAdapter', () => {
  const adapter = new OpenRouterAdapter();
  const config = createProviderConfig({ kind: 'openrouter', apiKey: 'test-secret' });

  it('should label the image by its bytes, not its file name', async () => {
    fetchMock.mockResolvedValueOnce(chatResponse('{"total": 9}'));

    await adapter.extract(PNG_BYTES, 'image/jpeg', 'read it', config);

    const request = sentRequest();
    expect(request.url).toBe(`${OPENROUTER_BASE_URL}/chat/completions`);
    expect(request.body).toMatchObject({
      model: 'google/gemini-2.0-flash-exp:free',
      messages: [
        {
          content: [
            { type: 'text', text: 'read it' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,iVBORw0KGgoAAQ==' } },
          ],
        },
      ],
    });
  });

  it('should send the attribution headers', async () => {
    fetchMock.mockResolvedValueOnce(chatResponse('{"total": 9}'));

    await adapter.extract(PNG_BYTES, 'image/png', 'read it', config);

    const { headers } = sentRequest();
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(headers.get('http-referer')).toBe('http://localhost/invoice-ledger');
    expect(headers.get('x-title')).toBe('Invoice Ledger');
    expect(headers.get('content-type')).toBe('application/json');
  });

  it('should list models with a context window, sorted by name', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        data: [
          { id: 'b/beta', name: 'Beta', context_length: 1000 },
          { id: 'a/alpha', name: 'Alpha', context_length: 0 },
          { id: 'c/alpha-two', name: 'Alpha Two', context_length: 8192 },
        ],
      })
    );

    const models = await adapter.listModels(config);

    expect(models).toEqual([
      { id: 'c/alpha-two', name: 'Alpha Two' },
      { id: 'b/beta', name: 'Beta' },
    ]);
    expect(sentRequest().url).toBe(`${OPENROUTER_BASE_URL}/models`);
  });

  it('should require an API key', () => {
    expect(() => adapter.validate(createProviderConfig({ kind: 'openrouter', apiKey: '' }))).toThrow(
      'OpenRouter API key is required'
    );
  });
});

describe('requestJson', () => {
  const options = { provider: 'openrouter', timeoutMs: 1000 } as const;

  it('should map 401 to a non-retryable AuthError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401 }));

    const error = await requestJson('https://provider.test', options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ retryable: false, status: 401, message: 'openrouter HTTP 401: bad key' });
  });

  it('should map 429 to RateLimitError with the Retry-After delay', async () => {
    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '7' } }));

    const error = await requestJson('https://provider.test', options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryable: true, retryAfterMs: 7000 });
  });

  it('should map 5xx to a retryable NetworkError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 503 }));

    await expect(requestJson('https://provider.test', options)).rejects.toMatchObject({
      code: 'NETWORK_ERROR',
      retryable: true,
      message: 'openrouter HTTP 503',
    });
  });

  it('should map other 4xx to ConfigError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('no such model', { status: 404 }));

    await expect(requestJson('https://provider.test', options)).rejects.toBeInstanceOf(ConfigError);
  });

  it('should wrap connection failures and timeouts', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(requestJson('https://provider.test', options)).rejects.toBeInstanceOf(NetworkError);

    fetchMock.mockRejectedValueOnce(Object.assign(new Error('The operation timed out'), { name: 'TimeoutError' }));
    await expect(requestJson('https://provider.test', options)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should treat an invalid JSON body as a network failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(requestJson('https://provider.test', options)).rejects.toMatchObject({
      code: 'NETWORK_ERROR',
      message: 'openrouter returned an invalid JSON body',
    });
  });
});

describe('response helpers', () => {
  it('should parse Retry-After seconds and dates', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(new Date(10_000).toUTCString(), 4000)).toBe(6000);
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter(null)).toBeUndefined();
  });

  it('should join content parts of a chat completion', () => {
    const data = { choices: [{ message: { content: [{ type: 'text', text: '{"total"' }, { text: ': 3}' }] } }] };

    expect(readChatCompletion(data, 'volcengine')).toBe('{"total": 3}');
  });

  it('should raise EmptyResponseError with the provider error message', () => {
    expect(() => readChatCompletion({ choices: [], error: { message: 'quota' } }, 'openrouter')).toThrow(
      'openrouter returned empty content: quota'
    );
  });
});
