/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export {
  CaptureConfigSchema,
  PartialCaptureConfigSchema,
  ConfigFileSchema,
  ConsoleModeSchema,
} from './schema.js';
export type { CaptureConfig, PartialCaptureConfig, ConsoleMode } from './schema.js';

// Defaults
export { DEFAULT_CONFIG } from './defaults.js';

// Loader functions
export {
  loadConfig,
  readConfigFile,
  resolveCaptureSettings,
  type LoadConfigOptions,
} from './loader.js';

// Environment variables
export { loadEnv, getEnvOverrides, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
