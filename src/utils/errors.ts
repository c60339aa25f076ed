/**
 * Error handling for the intake engine
 * Custom error types with context and recovery information
 */

/**
 * Base error class for the intake engine
 */
export class IntakeError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "IntakeError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, IntakeError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * File system error
 */
export class FileSystemError extends IntakeError {
  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "delete" | "exists" | "list";
      cause?: Error;
    },
  ) {
    super(message, {
      code: "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation },
      recoverable: false,
      suggestion: `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
  }
}

/**
 * Configuration error
 */
export class ConfigError extends IntakeError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .intake/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Validation error
 */
export class ValidationError extends IntakeError {
  readonly field?: string;
  readonly issues: ValidationIssue[];

  constructor(
    message: string,
    options: {
      field?: string;
      issues?: ValidationIssue[];
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "VALIDATION_ERROR",
      context: { field: options.field, issues: options.issues },
      recoverable: true,
      suggestion: "Check the input data format",
      cause: options.cause,
    });
    this.name = "ValidationError";
    this.field = options.field;
    this.issues = options.issues ?? [];
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Session lookup or persistence error
 */
export class SessionError extends IntakeError {
  readonly sessionId: string;

  constructor(
    message: string,
    options: {
      sessionId: string;
      recoverable?: boolean;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "SESSION_ERROR",
      context: { sessionId: options.sessionId },
      recoverable: options.recoverable ?? false,
      suggestion: "Run 'intake sessions list' to see the stored sessions",
      cause: options.cause,
    });
    this.name = "SessionError";
    this.sessionId = options.sessionId;
  }
}

/**
 * Background planning error
 */
export class PlanningError extends IntakeError {
  readonly sessionId?: string;
  readonly step?: string;

  constructor(
    message: string,
    options: {
      sessionId?: string;
      step?: string;
      recoverable?: boolean;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "PLANNING_ERROR",
      context: { sessionId: options.sessionId, step: options.step },
      recoverable: options.recoverable ?? true,
      suggestion: "Planning restarts automatically on the next eligible turn",
      cause: options.cause,
    });
    this.name = "PlanningError";
    this.sessionId = options.sessionId;
    this.step = options.step;
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends IntakeError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(
    message: string,
    options: {
      timeoutMs: number;
      operation: string;
    },
  ) {
    super(message, {
      code: "TIMEOUT_ERROR",
      context: { timeoutMs: options.timeoutMs, operation: options.operation },
      recoverable: true,
      suggestion: "Try increasing planning.stepTimeoutMs in the config",
    });
    this.name = "TimeoutError";
    this.timeoutMs = options.timeoutMs;
    this.operation = options.operation;
  }
}

/**
 * Check if error is a specific type
 */
export function isIntakeError(error: unknown): error is IntakeError {
  return error instanceof IntakeError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  CONFIG_ERROR: "Check your .intake/config.json or the file named by INTAKE_CONFIG_PATH.",
  FILESYSTEM_ERROR: "Check that the path exists and you have read/write permissions.",
  VALIDATION_ERROR: "Check the input data format. See 'intake --help' for usage.",
  SESSION_ERROR: "Run 'intake sessions list' to see the stored sessions.",
  PLANNING_ERROR: "Planning restarts automatically on the next eligible turn.",
  TIMEOUT_ERROR: "Try increasing planning.stepTimeoutMs in the config.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Run again with INTAKE_LOG_LEVEL=debug.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof IntakeError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Wrap an async function with error handling
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: { operation: string; recoverable?: boolean },
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof IntakeError) {
      throw error;
    }

    throw new IntakeError(error instanceof Error ? error.message : String(error), {
      code: "UNEXPECTED_ERROR",
      context: { operation: context.operation },
      recoverable: context.recoverable ?? false,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
