/**
 * Configuration Schema
 *
 * Defines the capture settings using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * How a capture hooks into its stream
 * - wrap: replace the stream's write() and emulate a terminal
 * - wrap_raw: replace write() and pass chunks through untouched
 * - redirect: also tap writeSync() on the stream's file descriptor
 */
export const ConsoleModeSchema = z.enum(['wrap', 'wrap_raw', 'redirect']);

export type ConsoleMode = z.infer<typeof ConsoleModeSchema>;

/**
 * Root configuration schema
 */
export const CaptureConfigSchema = z.object({
  scrollback_rows: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .describe('Rows kept revisable before the oldest is finalized (1-100000, default 100)'),
  mode: ConsoleModeSchema.describe('Interception variant used by createConsoleCapture'),
  drain_timeout_ms: z
    .number()
    .int()
    .min(0)
    .max(600000)
    .describe('Upper bound on the pipe drain during a redirect uninstall (default 5000)'),
  debug: z.boolean().describe('Log install/uninstall transitions'),
});

export type CaptureConfig = z.infer<typeof CaptureConfigSchema>;

/**
 * Every field optional, for sparse config files and overrides
 */
export const PartialCaptureConfigSchema = CaptureConfigSchema.partial();
export type PartialCaptureConfig = z.infer<typeof PartialCaptureConfigSchema>;

/**
 * Shape of the TOML config file: settings live under [capture]
 */
export const ConfigFileSchema = z.object({
  capture: PartialCaptureConfigSchema.strict().optional(),
});
