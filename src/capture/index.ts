/**
 * Capture Module
 *
 * Interceptors that replay a stream's output through a TerminalEmulator
 * and hand each finalized line to callbacks.
 */

export { Capture, resolveStream } from './capture.js';
export { StreamWrapper } from './stream-wrapper.js';
export { DescriptorRedirect } from './descriptor-redirect.js';
export { DescriptorTaps, MAX_EAGAIN_RETRIES, bytesOfWriteSync, type DescriptorSink } from './descriptor-taps.js';
export { InstallationStack } from './installation-stack.js';
export { CallbackDispatcher } from './dispatcher.js';
export { RawSink } from './raw-sink.js';
export { createDiagnosticLogger, type DiagnosticLoggerOptions } from './diagnostics.js';
export { createConsoleCapture, type ConsoleCapture } from './factory.js';

export type {
  StreamName,
  WriteCallback,
  CaptureStream,
  CaptureTarget,
  CaptureOptions,
  StreamWrapperOptions,
  DescriptorIO,
  DescriptorRedirectOptions,
  ConsoleCaptureOptions,
  LineCallback,
} from './types.js';
