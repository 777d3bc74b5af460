/**
 * Error definitions for sector-analyst
 * Provides the structured error hierarchy for orchestration and its collaborators
 */

/** Base error class for all sector-analyst errors */
export class AnalystError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'AnalystError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnalystError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * Malformed dependency graph, unknown role or invalid options.
 * Raised before any task launches; never retried.
 */
export class ConfigurationError extends AnalystError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
    super(
      issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message,
      'CONFIGURATION_ERROR',
      { issues, ...context },
    )
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/** Timeout, rate limiting or a transient backend failure. Retried per policy. */
export class TransientInferenceError extends AnalystError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TRANSIENT_INFERENCE_ERROR', context)
    this.name = 'TransientInferenceError'
  }
}

/** Authentication failure or a request the backend rejected. Never retried. */
export class PermanentInferenceError extends AnalystError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PERMANENT_INFERENCE_ERROR', context)
    this.name = 'PermanentInferenceError'
  }
}

/** A mandatory prerequisite of a role did not succeed; the role is skipped */
export class DependencyUnmetError extends AnalystError {
  public readonly role: string
  public readonly unmet: string[]

  constructor(role: string, unmet: string[]) {
    super(
      `Role "${role}" skipped: mandatory prerequisite(s) did not succeed: ${unmet.join(', ')}`,
      'DEPENDENCY_UNMET',
      { role, unmet },
    )
    this.name = 'DependencyUnmetError'
    this.role = role
    this.unmet = unmet
  }
}

/** The synthesis call could not run or failed after retries; the run is failed */
export class AggregationError extends AnalystError {
  public readonly attempts: number
  /** Error of the last synthesis attempt, when one was made */
  public readonly lastError: { errorClass: string; message: string } | undefined

  constructor(
    message: string,
    attempts: number,
    lastError?: { errorClass: string; message: string },
    context: Record<string, unknown> = {},
  ) {
    super(message, 'AGGREGATION_ERROR', { attempts, lastError, ...context })
    this.name = 'AggregationError'
    this.attempts = attempts
    this.lastError = lastError
  }
}

/** A second result write for the same role without an explicit retry-replace */
export class DuplicateWriteError extends AnalystError {
  constructor(role: string) {
    super(`Result for role "${role}" has already been written`, 'DUPLICATE_WRITE', { role })
    this.name = 'DuplicateWriteError'
  }
}

/** Lookup of a result that was never written */
export class ResultNotFoundError extends AnalystError {
  constructor(role: string) {
    super(`No result stored for role "${role}"`, 'RESULT_NOT_FOUND', { role })
    this.name = 'ResultNotFoundError'
  }
}

/** The raw data provider has no input for a role */
export class InputNotFoundError extends AnalystError {
  constructor(role: string, context: Record<string, unknown> = {}) {
    super(`No input data available for role "${role}"`, 'INPUT_NOT_FOUND', { role, ...context })
    this.name = 'InputNotFoundError'
  }
}

/** The run was aborted before the task reached a terminal state */
export class CancelledError extends AnalystError {
  constructor(message = 'Run was cancelled', context: Record<string, unknown> = {}) {
    super(message, 'CANCELLED', context)
    this.name = 'CancelledError'
  }
}

/** Writing artifacts to an external sink failed */
export class PersistenceError extends AnalystError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PERSISTENCE_ERROR', context)
    this.name = 'PersistenceError'
  }
}
