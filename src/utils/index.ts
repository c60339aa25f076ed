/**
 * Utility exports for the intake engine
 */

// Logger
export {
  createLogger,
  createChildLogger,
  getLogger,
  setLogger,
  initializeLogging,
  isLogLevel,
  logEvent,
  logTiming,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  IntakeError,
  ConfigError,
  FileSystemError,
  ValidationError,
  SessionError,
  PlanningError,
  TimeoutError,
  isIntakeError,
  errorMessage,
  formatError,
  withErrorHandling,
  type ConfigIssue,
  type ValidationIssue,
} from "./errors.js";

// Validation
export { validate, safeValidate, parseJsonSafe } from "./validation.js";

// Async utilities
export { timeout } from "./async.js";

// String utilities
export { truncate, pluralize, escapeRegExp, containsPhrase, findSubstrings } from "./strings.js";

// File utilities
export { ensureDir, readJsonFile, writeJsonFile } from "./files.js";

// Data tables
export { dataFileUrl, deepFreeze, loadDataFile } from "./data.js";
