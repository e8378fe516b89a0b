/**
 * Configuration Loader
 *
 * Resolves capture settings from, in increasing priority:
 * 1. Built-in defaults
 * 2. An optional TOML file ([capture] table)
 * 3. CONSOLE_CAPTURE_* environment variables
 * 4. Options passed to a capture constructor
 *
 * Every layer is validated with the Zod schema before use.
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { ConfigError, ValidationError } from '../errors/index.js';
import {
  CaptureConfigSchema,
  ConfigFileSchema,
  type CaptureConfig,
  type PartialCaptureConfig,
} from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { getEnvOverrides } from './env.js';

export interface LoadConfigOptions {
  /** TOML file with a [capture] table */
  path?: string;
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Merge layers left to right; `undefined` never overrides a value.
 */
function mergeLayers(...layers: PartialCaptureConfig[]): PartialCaptureConfig {
  const result: PartialCaptureConfig = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(result, { [key]: value });
      }
    }
  }
  return result;
}

/**
 * Read the [capture] table of a TOML config file.
 *
 * @throws ConfigError if the file is missing, unparsable or invalid
 */
export function readConfigFile(configPath: string): PartialCaptureConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `Config file does not exist: ${configPath}`,
      'Check the path passed as configPath'
    );
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = ConfigFileSchema.safeParse(parsed);

  if (!validationResult.success) {
    const issues = describeIssues(validationResult.error)
      .map((issue) => `  - ${issue}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration in ${configPath}:\n${issues}`);
  }

  return validationResult.data.capture ?? {};
}

/**
 * Load the effective configuration (defaults + file + environment).
 */
export function loadConfig(options: LoadConfigOptions = {}): CaptureConfig {
  const fromFile = options.path ? readConfigFile(options.path) : {};
  const merged = mergeLayers(DEFAULT_CONFIG, fromFile, getEnvOverrides());

  const validationResult = CaptureConfigSchema.safeParse(merged);
  if (!validationResult.success) {
    const issues = describeIssues(validationResult.error)
      .map((issue) => `  - ${issue}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  return validationResult.data;
}

/**
 * Resolve the settings for one capture: explicit overrides win over the
 * loaded configuration.
 *
 * @throws ValidationError if an override is out of range
 */
export function resolveCaptureSettings(
  overrides: PartialCaptureConfig,
  options: LoadConfigOptions = {}
): CaptureConfig {
  const merged = mergeLayers(loadConfig(options), overrides);
  const validationResult = CaptureConfigSchema.safeParse(merged);

  if (!validationResult.success) {
    throw new ValidationError('Invalid capture options', describeIssues(validationResult.error));
  }

  return validationResult.data;
}
