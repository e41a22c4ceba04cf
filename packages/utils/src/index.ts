/**
 * @reelvault/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  streamCommand,
  type CommandResult,
  type CommandOptions,
  type StreamCommandOptions,
  type OutputStream,
} from './command.js';

// File operations
export {
  ensureDir,
  writePrivateFile,
  getFileSizeBytes,
  removeFile,
  moveFile,
} from './file.js';

// Retry logic
export { retry, isRetryable, type RetryOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  isSafeStorageKey,
  resolveInside,
} from './path.js';

// Type guards
export { isErrnoException, errorMessage } from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
