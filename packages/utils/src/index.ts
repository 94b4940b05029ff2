/**
 * @vidtool/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and filename helpers
 * - Time formatting
 * - Type guards
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  safeStat,
  pathExists,
  removeIfEmpty,
  isWritableDir,
  moveFile,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  hasInvalidFilenameChars,
  getBasename,
  normalizeExtension,
} from './path.js';

// Type guards
export {
  isNonEmptyString,
  getErrorMessage,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  formatRuntime,
  formatEta,
  formatDateStamp,
  formatCompactDate,
  formatTimeStamp,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
