/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { silentLogger, type Logger } from './logger.js';

export { toBytes, toBuffer } from './bytes.js';
