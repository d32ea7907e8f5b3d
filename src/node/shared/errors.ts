/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 *
 * Git command outcomes are not errors: they are returned as data by
 * GitOperations. These classes cover what the engine cannot model as an outcome.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when an external program cannot be started at all
 * (binary missing, permission denied).
 */
export class SpawnError extends AppError {
  constructor(
    message: string,
    public readonly program: string,
    public readonly code?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'SpawnError'
  }
}

/**
 * Error thrown when a git query the engine cannot proceed without fails.
 */
export class GitCommandError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly exitCode?: number
  ) {
    super(message)
    this.name = 'GitCommandError'
  }
}

/**
 * Error thrown when a forge (GitLab) operation fails.
 */
export class ForgeError extends AppError {
  constructor(
    message: string,
    public readonly operation:
      | 'create-mr'
      | 'fetch-mr'
      | 'fetch-mrs'
      | 'fetch-emails'
      | 'fetch-projects'
      | 'fetch-pipelines'
      | 'fetch-jobs'
      | 'validate',
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'ForgeError'
  }
}

/**
 * Error thrown when session or history persistence fails.
 * The operation that triggered the write is treated as not committed.
 */
export class StorageError extends AppError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'StorageError'
  }
}

/**
 * Error thrown when a validation check fails.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when a required resource is not found.
 */
export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly resourceType: 'history-record' | 'session' | 'merge-request'
  ) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/**
 * Error thrown when a session is in an invalid state for an operation.
 */
export class SessionError extends AppError {
  constructor(
    message: string,
    public readonly sessionId: string,
    public readonly expectedState?: string,
    public readonly actualState?: string
  ) {
    super(message)
    this.name = 'SessionError'
  }
}

/**
 * Error thrown when a command arrives while a step is still running.
 * Only abort is accepted in that window.
 */
export class SessionBusyError extends SessionError {
  constructor(sessionId: string) {
    super('A release step is still running; only abort is accepted', sessionId)
    this.name = 'SessionBusyError'
  }
}

/**
 * Programmer-facing invariant violation, e.g. retrying a session that is not
 * suspended.
 */
export class InvariantError extends AppError {
  constructor(message: string) {
    super(message)
    this.name = 'InvariantError'
  }
}
