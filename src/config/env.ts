/**
 * Environment Variable Handler
 *
 * Reads capture overrides from the environment:
 * - CONSOLE_CAPTURE_SCROLLBACK_ROWS
 * - CONSOLE_CAPTURE_MODE (wrap | wrap_raw | redirect)
 * - CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS
 * - CONSOLE_CAPTURE_DEBUG (1/true/yes)
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { ConsoleModeSchema, type PartialCaptureConfig } from './schema.js';

const BooleanFlagSchema = z
  .string()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

export const EnvSchema = z.object({
  CONSOLE_CAPTURE_SCROLLBACK_ROWS: z.coerce.number().int().optional(),
  CONSOLE_CAPTURE_MODE: ConsoleModeSchema.optional(),
  CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS: z.coerce.number().int().optional(),
  CONSOLE_CAPTURE_DEBUG: BooleanFlagSchema.optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * Tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

/**
 * Read a variable, treating empty strings as unset so that
 * `CONSOLE_CAPTURE_MODE=` does not fail coercion.
 */
function readVar(name: keyof EnvVars): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError if a variable is set to a value of the wrong type
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    CONSOLE_CAPTURE_SCROLLBACK_ROWS: readVar('CONSOLE_CAPTURE_SCROLLBACK_ROWS'),
    CONSOLE_CAPTURE_MODE: readVar('CONSOLE_CAPTURE_MODE'),
    CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS: readVar('CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS'),
    CONSOLE_CAPTURE_DEBUG: readVar('CONSOLE_CAPTURE_DEBUG'),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment configuration:\n${issues}`,
      'Unset the variable or give it a valid value'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Environment overrides in config-file shape.
 */
export function getEnvOverrides(): PartialCaptureConfig {
  const env = loadEnv();
  const overrides: PartialCaptureConfig = {};

  if (env.CONSOLE_CAPTURE_SCROLLBACK_ROWS !== undefined) {
    overrides.scrollback_rows = env.CONSOLE_CAPTURE_SCROLLBACK_ROWS;
  }
  if (env.CONSOLE_CAPTURE_MODE !== undefined) {
    overrides.mode = env.CONSOLE_CAPTURE_MODE;
  }
  if (env.CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS !== undefined) {
    overrides.drain_timeout_ms = env.CONSOLE_CAPTURE_DRAIN_TIMEOUT_MS;
  }
  if (env.CONSOLE_CAPTURE_DEBUG !== undefined) {
    overrides.debug = env.CONSOLE_CAPTURE_DEBUG;
  }

  return overrides;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
