import { Effect } from 'effect'

import {
  ClusterConflictError,
  type ClusterError,
  ClusterInvalidError,
  isClusterError,
  toClusterError,
} from '@/clusters/errors'

const STATUS_BY_KIND: Record<ClusterError['kind'], number> = {
  NotFound: 404,
  Conflict: 409,
  Invalid: 400,
  Unauthorized: 401,
  Forbidden: 403,
  Timeout: 504,
  Internal: 500,
}

export const jsonResponse = (body: unknown, init: ResponseInit = {}) => {
  const headers = new Headers(init.headers)
  headers.set('content-type', 'application/json')
  return new Response(JSON.stringify(body), { ...init, headers })
}

export const errorResponse = (error: ClusterError) =>
  jsonResponse(
    {
      error: {
        kind: error.kind,
        message: error.message,
        retryable: error.retryable,
        ...(error instanceof ClusterInvalidError ? { issues: error.issues } : {}),
        ...(error instanceof ClusterConflictError && error.current ? { current: error.current } : {}),
      },
    },
    { status: STATUS_BY_KIND[error.kind] },
  )

/** Reads a JSON body; an empty body reads as `{}`. */
export const readJsonBody = (request: Request) =>
  Effect.tryPromise({
    try: () => request.text(),
    catch: (error) => toClusterError('read request body', error),
  }).pipe(
    Effect.flatMap((text) =>
      text.trim().length === 0
        ? Effect.succeed<unknown>({})
        : Effect.try({
            try: (): unknown => JSON.parse(text),
            catch: () => new ClusterInvalidError('request body must be valid JSON'),
          }),
    ),
  )

/**
 * Runs a handler effect to a Response. Typed failures map to their status code; anything else is
 * reported as an internal error.
 */
export const respond = <R>(effect: Effect.Effect<Response, ClusterError, R>) =>
  effect.pipe(
    Effect.catchAll((error) => Effect.succeed(errorResponse(error))),
    Effect.catchAllDefect((defect) =>
      Effect.succeed(errorResponse(isClusterError(defect) ? defect : toClusterError('handle request', defect))),
    ),
  )
