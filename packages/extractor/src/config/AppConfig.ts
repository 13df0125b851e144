import { chmod, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage, systemErrorCode } from '../errors';
import type { BatchSettings } from '../pipeline/BatchOrchestrator';
import {
  createProviderConfig,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
  OLLAMA_DEFAULTS,
  OPENROUTER_DEFAULT_MODEL,
} from '../providers/config';
import type { ProviderConfig } from '../types';
import { isRecord } from '../utils';
import { DEFAULT_EXCLUDE_KEYWORDS } from '../walker/FileWalker';

export const CONFIG_FILE_NAME = '.invoice-ledger.json';

// ============================================================================
// Schema
// ============================================================================

export const AppConfigSchema = z.object({
  provider: z.enum(['ollama', 'volcengine', 'openrouter']).default('ollama'),

  ollamaHost: z.string().trim().min(1).default(OLLAMA_DEFAULTS.host),
  ollamaPort: z.number().int().min(1).max(65535).default(OLLAMA_DEFAULTS.port),
  ollamaModel: z.string().trim().min(1).default(OLLAMA_DEFAULTS.model),

  volcengineApiKey: z.string().trim().default(''),
  /** Inference endpoint id (ep-...) */
  volcengineEndpointId: z.string().trim().default(''),
  volcengineModel: z.string().trim().default(''),

  openrouterApiKey: z.string().trim().default(''),
  openrouterModel: z.string().trim().min(1).default(OPENROUTER_DEFAULT_MODEL),

  maxRetries: z.number().int().min(1).max(10).default(DEFAULT_MAX_RETRIES),
  timeoutMs: z.number().int().min(1000).default(DEFAULT_TIMEOUT_MS),

  scanDirectory: z.string().trim().default(''),
  mode: z.enum(['simple', 'full']).default('full'),
  concurrency: z.number().int().min(1).max(16).default(1),
  excludeKeywords: z.array(z.string()).default([...DEFAULT_EXCLUDE_KEYWORDS]),
  pdftoppmPath: z.string().trim().min(1).default('pdftoppm'),

  enableExcel: z.boolean().default(true),
  enableMarkdown: z.boolean().default(true),
  enableRename: z.boolean().default(false),
  enableValidate: z.boolean().default(false),
  enableVerify: z.boolean().default(false),
  enableClassify: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const SECRET_KEYS = ['volcengineApiKey', 'openrouterApiKey'] as const;

export function defaultConfigPath(): string {
  return join(homedir(), CONFIG_FILE_NAME);
}

/**
 * Validate and default a raw configuration document. Unknown keys are dropped.
 *
 * @throws ConfigError listing every invalid key
 */
export function parseAppConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }
  return result.data;
}

// ============================================================================
// Environment overrides
// ============================================================================

/**
 * OLLAMA_HOST follows Ollama's own convention: host, host:port or a URL
 */
function parseOllamaHost(value: string): { host: string; port?: number } {
  const withoutScheme = value.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
  const match = withoutScheme.match(/^(.*):(\d+)$/);
  if (match) {
    return { host: match[1], port: Number(match[2]) };
  }
  return { host: withoutScheme };
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  if (env.INVOICE_LEDGER_PROVIDER) result.provider = env.INVOICE_LEDGER_PROVIDER.trim();
  if (env.OPENROUTER_API_KEY) result.openrouterApiKey = env.OPENROUTER_API_KEY;
  if (env.VOLCENGINE_API_KEY) result.volcengineApiKey = env.VOLCENGINE_API_KEY;
  if (env.OLLAMA_HOST) {
    const { host, port } = parseOllamaHost(env.OLLAMA_HOST);
    if (host) result.ollamaHost = host;
    if (port !== undefined) result.ollamaPort = port;
  }

  return result;
}

// ============================================================================
// Persistence
// ============================================================================

async function readConfigDocument(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return {};
    throw new ConfigError(`Cannot read configuration ${path}: ${errorMessage(error)}`, { cause: error });
  }

  if (!text.trim()) return {};

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration ${path} is not valid JSON`, { cause: error });
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Configuration ${path} must be a JSON object`);
  }
  return data;
}

export interface LoadConfigOptions {
  path?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Read the configuration file (missing file = defaults) and apply
 * environment overrides.
 */
export async function loadAppConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const path = options.path ?? defaultConfigPath();
  const raw = await readConfigDocument(path);
  return parseAppConfig(applyEnvOverrides(raw, options.env ?? process.env));
}

export async function saveAppConfig(config: AppConfig, path: string = defaultConfigPath()): Promise<void> {
  const validated = parseAppConfig(config);
  await writeFile(path, `${JSON.stringify(validated, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
  // mode only applies when the file is created
  await chmod(path, 0o600);
}

// ============================================================================
// Secrets
// ============================================================================

const MASK = '********';

export function maskSecret(value: string): string {
  if (!value) return '';
  return value.length > 8 ? `${MASK}${value.slice(-4)}` : MASK;
}

function isMasked(value: unknown): boolean {
  return typeof value === 'string' && value.startsWith(MASK);
}

export function maskAppConfig(config: AppConfig): AppConfig {
  const masked = { ...config };
  for (const key of SECRET_KEYS) {
    masked[key] = maskSecret(config[key]);
  }
  return masked;
}

/**
 * Apply a partial update. Secret fields sent back masked keep their
 * current value.
 */
export function mergeAppConfig(current: AppConfig, patch: unknown): AppConfig {
  if (!isRecord(patch)) {
    throw new ConfigError('Configuration update must be a JSON object');
  }

  const merged: Record<string, unknown> = { ...current, ...patch };
  for (const key of SECRET_KEYS) {
    if (isMasked(patch[key])) {
      merged[key] = current[key];
    }
  }
  return parseAppConfig(merged);
}

// ============================================================================
// Derived settings
// ============================================================================

export function toProviderConfig(config: AppConfig): ProviderConfig {
  const limits = { maxRetries: config.maxRetries, timeoutMs: config.timeoutMs };

  switch (config.provider) {
    case 'ollama':
      return createProviderConfig({
        kind: 'ollama',
        host: config.ollamaHost,
        port: config.ollamaPort,
        model: config.ollamaModel,
        ...limits,
      });
    case 'volcengine':
      return createProviderConfig({
        kind: 'volcengine',
        apiKey: config.volcengineApiKey,
        endpointId: config.volcengineEndpointId,
        model: config.volcengineModel,
        ...limits,
      });
    case 'openrouter':
      return createProviderConfig({
        kind: 'openrouter',
        apiKey: config.openrouterApiKey,
        model: config.openrouterModel,
        ...limits,
      });
  }
}

export function toBatchSettings(config: AppConfig): BatchSettings {
  return {
    mode: config.mode,
    enableValidate: config.enableValidate,
    enableClassify: config.enableClassify,
    enableVerify: config.enableVerify,
    concurrency: config.concurrency,
  };
}
