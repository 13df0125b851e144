/**
 * Configuration exports
 */

export {
  AppConfigSchema,
  applyEnvOverrides,
  CONFIG_FILE_NAME,
  defaultConfigPath,
  loadAppConfig,
  maskAppConfig,
  maskSecret,
  mergeAppConfig,
  parseAppConfig,
  saveAppConfig,
  toBatchSettings,
  toProviderConfig,
  type AppConfig,
  type LoadConfigOptions,
} from './AppConfig';
