/**
 * Structured Error System for DPLL Logic
 *
 * Provides machine-readable errors with codes and suggestions.
 * The solver itself never throws: unsatisfiability is a normal result.
 * These errors only arise at the library boundary.
 */

/**
 * Error codes for logic operations
 */
export type LogicErrorCode =
  | 'INVALID_INPUT'         // Knowledge base failed validation
  | 'ENGINE_NOT_FOUND'      // Unknown engine name
  | 'ENGINE_ERROR';         // Backend solver failure

/**
 * Structured error with code, message and suggestion
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * A single validation problem, located by its path in the input.
 */
export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Create an invalid input error from validation issues
 */
export function createInvalidInputError(issues: InputIssue[]): LogicException {
  const first = issues[0];
  const where = first && first.path ? ` at ${first.path}` : '';
  return new LogicException({
    code: 'INVALID_INPUT',
    message: `Invalid knowledge base${where}: ${first ? first.message : 'unknown problem'}`,
    suggestion: 'Provide an array of clauses, each an array of "A", "-A" or { name, sign } literals',
    details: { issues },
  });
}

/**
 * Create an engine not found error
 */
export function createEngineNotFoundError(
  name: string,
  available: readonly string[]
): LogicException {
  return new LogicException({
    code: 'ENGINE_NOT_FOUND',
    message: `Unknown engine '${name}'`,
    suggestion: `Use one of: ${available.join(', ')}`,
    details: { name, available: [...available] },
  });
}

/**
 * Create an engine error
 */
export function createEngineError(
  engine: string,
  cause: unknown
): LogicException {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new LogicException({
    code: 'ENGINE_ERROR',
    message: `${engine} engine error: ${message}`,
    details: { engine },
  });
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}
