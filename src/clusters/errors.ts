import type { ClusterRecord } from './types'

export type ClusterErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'Invalid'
  | 'Unauthorized'
  | 'Forbidden'
  | 'Timeout'
  | 'Internal'

/**
 * Base for every failure surfaced by the core. Callers branch on `kind`, never on `message`.
 */
export abstract class ClusterError extends Error {
  abstract readonly kind: ClusterErrorKind

  get retryable(): boolean {
    return false
  }
}

export class ClusterNotFoundError extends ClusterError {
  readonly _tag = 'ClusterNotFoundError'
  readonly kind = 'NotFound'
  readonly clusterId: string

  constructor(clusterId: string) {
    super(`cluster ${clusterId} not found`)
    this.name = 'ClusterNotFoundError'
    this.clusterId = clusterId
  }
}

export class ClusterConflictError extends ClusterError {
  readonly _tag = 'ClusterConflictError'
  readonly kind = 'Conflict'
  /** The stored record at the time of the conflict, left unmodified. */
  readonly current?: ClusterRecord

  constructor(message: string, current?: ClusterRecord) {
    super(message)
    this.name = 'ClusterConflictError'
    this.current = current
  }
}

export class ClusterInvalidError extends ClusterError {
  readonly _tag = 'ClusterInvalidError'
  readonly kind = 'Invalid'
  readonly issues: readonly string[]

  constructor(message: string, issues: readonly string[] = []) {
    super(message)
    this.name = 'ClusterInvalidError'
    this.issues = issues
  }
}

export class ClusterUnauthorizedError extends ClusterError {
  readonly _tag = 'ClusterUnauthorizedError'
  readonly kind = 'Unauthorized'

  constructor(message = 'missing caller identity') {
    super(message)
    this.name = 'ClusterUnauthorizedError'
  }
}

export class ClusterForbiddenError extends ClusterError {
  readonly _tag = 'ClusterForbiddenError'
  readonly kind = 'Forbidden'

  constructor(message: string) {
    super(message)
    this.name = 'ClusterForbiddenError'
  }
}

export type ClusterTimeoutOptions = {
  /**
   * False when the timed out call may still complete on its own, e.g. a write the store keeps
   * running after the caller gave up.
   */
  retryable?: boolean
}

export class ClusterTimeoutError extends ClusterError {
  readonly _tag = 'ClusterTimeoutError'
  readonly kind = 'Timeout'
  readonly operation: string
  readonly timeoutMs: number
  readonly #retryable: boolean

  constructor(operation: string, timeoutMs: number, options: ClusterTimeoutOptions = {}) {
    const retryable = options.retryable ?? true
    super(
      retryable
        ? `${operation} timed out after ${timeoutMs}ms`
        : `${operation} timed out after ${timeoutMs}ms; the write may still have been applied`,
    )
    this.name = 'ClusterTimeoutError'
    this.operation = operation
    this.timeoutMs = timeoutMs
    this.#retryable = retryable
  }

  override get retryable(): boolean {
    return this.#retryable
  }
}

export class ClusterInternalError extends ClusterError {
  readonly _tag = 'ClusterInternalError'
  readonly kind = 'Internal'

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'ClusterInternalError'
  }
}

export const isClusterError = (error: unknown): error is ClusterError => error instanceof ClusterError

export const toClusterError = (operation: string, error: unknown): ClusterError => {
  if (isClusterError(error)) return error
  const detail = error instanceof Error ? error.message : String(error)
  return new ClusterInternalError(`${operation} failed: ${detail}`, error)
}
