/**
 * Console Capture - Library Entry Point
 *
 * Captures what a process writes to stdout or stderr and delivers it as
 * the lines a person would see once the terminal settled: carriage-return
 * progress bars collapse to their final state, cursor movement revises
 * earlier rows, and SGR styling is kept in the reported bytes.
 *
 * ## Interceptors
 *
 * - `StreamWrapper` hooks `stream.write()`. Cheap, synchronous, works everywhere.
 * - `DescriptorRedirect` also taps `fs.writeSync(fd, ...)` and forwards
 *   through an asynchronous pump. Not available on Windows.
 * - `createConsoleCapture` picks one from the configured `mode`.
 *
 * @example Collecting progress output
 * ```typescript
 * import { StreamWrapper } from 'console-capture';
 *
 * const lines: string[] = [];
 * const capture = new StreamWrapper('stderr', [(line) => lines.push(line.toString())]);
 * capture.install();
 * try {
 *   await train();
 * } finally {
 *   capture.uninstall();
 * }
 * ```
 *
 * @example Mode from configuration
 * ```typescript
 * import { createConsoleCapture } from 'console-capture';
 *
 * // CONSOLE_CAPTURE_MODE=redirect, or [capture] mode = "redirect" in a TOML file
 * const capture = createConsoleCapture('stdout', [log], { configPath: './capture.toml' });
 * capture.install();
 * ```
 *
 * @packageDocumentation
 */

export * from './capture/index.js';

export { TerminalEmulator, Scrollback, DEFAULT_SCROLLBACK_ROWS, MAX_COLUMNS, renderRow } from './emulator/index.js';
export type { Cell, Row, CursorPosition, LineSink, TerminalEmulatorOptions } from './emulator/index.js';

export {
  CaptureError,
  UsageError,
  UnsupportedPlatformError,
  CallbackError,
  PumpError,
  ConfigError,
  ValidationError,
  formatError,
  getErrorCode,
} from './errors/index.js';

export {
  loadConfig,
  readConfigFile,
  resolveCaptureSettings,
  DEFAULT_CONFIG,
  CaptureConfigSchema,
  ConsoleModeSchema,
} from './config/index.js';
export type { CaptureConfig, PartialCaptureConfig, ConsoleMode, LoadConfigOptions } from './config/index.js';

export { silentLogger, type Logger } from './utils/index.js';
