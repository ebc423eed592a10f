/**
 * Error Classes for the impact engine
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_OUT_OF_RANGE = "E1001",

  // Graph errors (3xxx)
  GRAPH_INVARIANT_VIOLATED = "E3000",
  GRAPH_NODE_NOT_FOUND = "E3004",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all engine errors
 */
export class ImpactEngineError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ImpactEngineError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid analysis configuration. Raised before any computation starts.
 */
export class ConfigurationError extends ImpactEngineError {
  public readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  override toString(): string {
    if (this.issues.length === 0) return super.toString();
    return `${super.toString()}\n  - ${this.issues.join("\n  - ")}`;
  }
}

/**
 * Dependency graph errors
 */
export class GraphError extends ImpactEngineError {
  public readonly nodeId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_INVARIANT_VIOLATED,
    context?: Record<string, unknown> & { nodeId?: string }
  ) {
    super(message, code, context);
    this.name = "GraphError";
    this.nodeId = context?.nodeId;
  }
}

/**
 * Check if an error is an ImpactEngineError
 */
export function isImpactEngineError(error: unknown): error is ImpactEngineError {
  return error instanceof ImpactEngineError;
}

/**
 * Wrap an unknown error in an ImpactEngineError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): ImpactEngineError {
  if (isImpactEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ImpactEngineError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new ImpactEngineError(typeof error === "string" ? error : defaultMessage, code);
}
