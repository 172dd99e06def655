/**
 * Error definitions for storyloom
 * Provides the structured error hierarchy shared by every component and
 * the exit code each class maps to at the CLI boundary.
 */

/** CLI exit codes */
export const EXIT_SUCCESS = 0
export const EXIT_VALIDATION = 1
export const EXIT_STATE_CONFLICT = 2
export const EXIT_GIT = 3
export const EXIT_TIMEOUT = 4

/** Base error class for all storyloom errors */
export class StoryloomError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>
  public readonly exitCode: number

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    exitCode: number = EXIT_VALIDATION
  ) {
    super(message)
    this.name = 'StoryloomError'
    this.code = code
    this.context = context
    this.exitCode = exitCode
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoryloomError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Bad user input: unknown stage, duplicate prefix, malformed id */
export class ValidationError extends StoryloomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', context, EXIT_VALIDATION)
    this.name = 'ValidationError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends StoryloomError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context, EXIT_VALIDATION)
    this.name = 'ConfigError'
  }
}

/**
 * Observed violation of filesystem state that needs a human to look at it.
 * Always carries a repair suggestion.
 */
export class StateConflictError extends StoryloomError {
  public readonly repair: string

  constructor(
    message: string,
    repair: string,
    context: Record<string, unknown> = {},
    code = 'STATE_CONFLICT'
  ) {
    super(message, code, { ...context, repair }, EXIT_STATE_CONFLICT)
    this.name = 'StateConflictError'
    this.repair = repair
  }
}

/** Local and remote story branches have diverged */
export class BranchConflictError extends StateConflictError {
  constructor(branch: string, context: Record<string, unknown> = {}) {
    super(
      `Branch "${branch}" has diverged from origin/${branch}`,
      `Reconcile the branch manually (rebase or merge origin/${branch}) inside the workspace, then provision again`,
      { ...context, branch },
      'BRANCH_CONFLICT'
    )
    this.name = 'BranchConflictError'
  }
}

/** Structured context every GitError carries */
export interface GitErrorDetails {
  operation: string
  url?: string
  exitCode: number
  stderr: string
  transient: boolean
}

/** Error thrown when git operations fail */
export class GitError extends StoryloomError {
  public readonly operation: string
  public readonly url: string | undefined
  public readonly gitExitCode: number
  public readonly stderr: string
  public readonly transient: boolean

  constructor(message: string, details: GitErrorDetails) {
    super(message, 'GIT_ERROR', { ...details }, EXIT_GIT)
    this.name = 'GitError'
    this.operation = details.operation
    this.url = details.url
    this.gitExitCode = details.exitCode
    this.stderr = details.stderr
    this.transient = details.transient
  }
}

/** A lock is held by another invocation past the lock timeout */
export class BusyError extends StoryloomError {
  constructor(resource: string, waitedMs: number, context: Record<string, unknown> = {}) {
    super(
      `${resource} is locked by another storyloom process (waited ${String(waitedMs)}ms)`,
      'BUSY',
      { ...context, resource, waitedMs },
      EXIT_TIMEOUT
    )
    this.name = 'BusyError'
  }
}

/** An external operation exceeded its configured timeout */
export class TimeoutError extends StoryloomError {
  constructor(operation: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(
      `${operation} timed out after ${String(timeoutMs)}ms`,
      'TIMEOUT',
      { ...context, operation, timeoutMs },
      EXIT_TIMEOUT
    )
    this.name = 'TimeoutError'
  }
}

/**
 * Normalize any thrown value into a StoryloomError so the pipeline and the
 * CLI can rely on `code` and `exitCode`.
 */
export function toStoryloomError(err: unknown): StoryloomError {
  if (err instanceof StoryloomError) return err
  if (err instanceof Error) {
    const wrapped = new StoryloomError(err.message, 'INTERNAL', { cause: err.name })
    wrapped.stack = err.stack
    return wrapped
  }
  return new StoryloomError(String(err), 'INTERNAL')
}
