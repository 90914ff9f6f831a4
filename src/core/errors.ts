/**
 * Error Classes for derived-props
 * Structured error handling with error codes
 */

import type { PropertyName } from "./declarations/types.js";

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Schema construction errors (1xxx)
  SCHEMA_INVALID_DECLARATION = "E1000",
  SCHEMA_CYCLE = "E1001",
  SCHEMA_UNKNOWN_PROPERTY = "E1002",

  // Evaluation errors (2xxx)
  EVAL_NO_MATCHING_CLAUSE = "E2000",
  EVAL_CLAUSE_FAILED = "E2001",
  EVAL_ALREADY_BOUND = "E2002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all engine errors
 */
export class PropertyEngineError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "PropertyEngineError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where error was thrown
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

  /**
   * Create a formatted error message
   */
  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

// =============================================================================
// Schema Construction
// =============================================================================

/**
 * Raised while building a schema. Fatal: no schema is produced.
 */
export class SchemaError extends PropertyEngineError {
  public readonly schemaName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCHEMA_INVALID_DECLARATION,
    context?: Record<string, unknown> & { schemaName?: string }
  ) {
    super(message, code, context);
    this.name = "SchemaError";
    this.schemaName = context?.schemaName;
  }
}

/**
 * The declared dependencies contain at least one cycle.
 *
 * `vertices` holds every property that sits on some cycle, in declaration order.
 */
export class CycleError extends SchemaError {
  public readonly vertices: ReadonlySet<PropertyName>;

  constructor(
    vertices: Iterable<PropertyName>,
    context?: Record<string, unknown> & { schemaName?: string }
  ) {
    const members = [...vertices];
    super(`dependency cycle found at [${members.join(", ")}]`, ErrorCode.SCHEMA_CYCLE, {
      ...context,
      vertices: members,
    });
    this.name = "CycleError";
    this.vertices = new Set(members);
  }
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Raised while evaluating a schema for one input. Fatal: no record is produced.
 */
export class EvaluationError extends PropertyEngineError {
  public readonly propertyName: PropertyName;

  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> & { propertyName: PropertyName },
    options?: ErrorOptions
  ) {
    super(message, code, context, options);
    this.name = "EvaluationError";
    this.propertyName = context.propertyName;
  }
}

/**
 * No clause of a property matched the partial result reached at dispatch time.
 */
export class DispatchError extends EvaluationError {
  public readonly partialResult: Readonly<Record<PropertyName, unknown>>;

  constructor(
    propertyName: PropertyName,
    partialResult: Readonly<Record<PropertyName, unknown>>,
    context?: Record<string, unknown> & { schemaName?: string }
  ) {
    super(`no clause of "${propertyName}" matches the partial result`, ErrorCode.EVAL_NO_MATCHING_CLAUSE, {
      ...context,
      propertyName,
      bound: Object.keys(partialResult),
    });
    this.name = "DispatchError";
    this.partialResult = partialResult;
  }
}

/**
 * A pattern, guard or body threw while a property was being dispatched.
 */
export class ClauseError extends EvaluationError {
  public readonly clauseIndex: number;
  public readonly stage: "pattern" | "guard" | "body";

  constructor(
    propertyName: PropertyName,
    clauseIndex: number,
    stage: "pattern" | "guard" | "body",
    cause: unknown,
    context?: Record<string, unknown> & { schemaName?: string }
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${stage} of clause ${clauseIndex} of "${propertyName}" failed: ${reason}`,
      ErrorCode.EVAL_CLAUSE_FAILED,
      { ...context, propertyName, clauseIndex, stage },
      { cause }
    );
    this.name = "ClauseError";
    this.clauseIndex = clauseIndex;
    this.stage = stage;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check if an error is a PropertyEngineError
 */
export function isPropertyEngineError(error: unknown): error is PropertyEngineError {
  return error instanceof PropertyEngineError;
}

/**
 * Wrap an unknown error in a PropertyEngineError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): PropertyEngineError {
  if (isPropertyEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PropertyEngineError(
      error.message || defaultMessage,
      code,
      { originalError: error.name, originalStack: error.stack },
      { cause: error }
    );
  }

  return new PropertyEngineError(typeof error === "string" ? error : defaultMessage, code);
}
