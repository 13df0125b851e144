import {
  defaultConfigPath,
  loadAppConfig,
  mergeAppConfig,
  saveAppConfig,
  type AppConfig,
} from '@invoice-ledger/extractor';

/**
 * Where the server keeps its configuration
 */
export interface ConfigStore {
  /** Effective configuration, environment overrides applied */
  get(): Promise<AppConfig>;
  /** Merge a partial document into the stored configuration and persist it */
  update(patch: unknown): Promise<AppConfig>;
}

/**
 * JSON file store. Environment overrides are applied on read and never
 * written back, so secrets from the environment stay out of the file.
 */
export class FileConfigStore implements ConfigStore {
  constructor(
    private readonly path: string = defaultConfigPath(),
    private readonly env: Record<string, string | undefined> = process.env
  ) {}

  get(): Promise<AppConfig> {
    return loadAppConfig({ path: this.path, env: this.env });
  }

  async update(patch: unknown): Promise<AppConfig> {
    const stored = await loadAppConfig({ path: this.path, env: {} });
    await saveAppConfig(mergeAppConfig(stored, patch), this.path);
    return this.get();
  }
}

export class MemoryConfigStore implements ConfigStore {
  constructor(private config: AppConfig) {}

  async get(): Promise<AppConfig> {
    return this.config;
  }

  async update(patch: unknown): Promise<AppConfig> {
    this.config = mergeAppConfig(this.config, patch);
    return this.config;
  }
}
