/**
 * @cache-mirror/utils
 * 
 * Shared utilities package containing:
 * - File existence probes and teardown helpers
 * - Remote path utilities
 * - Type guards
 * - Logger
 */

// File operations
export {
  fileExistsSync,
  pathExists,
  isDirectory,
  removeFile,
  removeDirRecursive,
  renamePath,
} from './file.js';

// Path utilities
export {
  normalizeRepoPath,
  getRepoPathSegments,
  getParentPath,
  getBaseName,
  joinRepoPath,
} from './path.js';

// Type guards
export {
  isString,
  isNonEmptyString,
  isDefined,
  isErrnoException,
  getErrorMessage,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
