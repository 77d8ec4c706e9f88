/**
 * @aligner/utils
 * 
 * Shared utilities package containing:
 * - Logger and environment configuration
 * - File and path operations
 * - Safe numeric parsing
 * - Time formatting
 * - Type guards
 */

// Environment
export { config, parseEnv, type Env } from './config.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';

// File operations
export {
  ensureDir,
  safeReadFile,
  removeBom,
  copyTree,
  type IgnoreFn,
} from './file.js';

// Path utilities
export {
  TMP_PATH,
  fileNameWithoutExtension,
  normJoin,
  customTmpDir,
  resolveTmpDir,
} from './path.js';

// Numeric parsing
export { safeFloat, safeInt } from './number.js';

// Type guards
export {
  isString,
  isNumber,
  isObject,
  isArray,
} from './guards.js';

// Time formatting
export {
  formatSeconds,
  formatClock,
  formatSrtClock,
} from './time.js';
