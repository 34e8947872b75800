import { Effect } from 'effect'

import { type ClusterError, ClusterInvalidError } from '@/clusters/errors'
import { ClusterService } from '@/clusters/service'
import { jsonResponse, readJsonBody, respond } from '@/routes/http'

export type ClusterRuntime = {
  runPromise: <A, E>(effect: Effect.Effect<A, E, ClusterService>) => Promise<A>
}

export interface ClusterHandlerDependencies {
  runtime: ClusterRuntime
}

const USER_HEADER = 'x-user-email'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value && typeof value === 'object' && !Array.isArray(value))

const optionalInt = (raw: string | null) => (raw === null || raw.trim() === '' ? undefined : Number(raw))

const etag = (generation: number) => `"${generation}"`

// Accepts `"3"`, `W/"3"` and a bare `3`.
const parseIfMatch = (raw: string | null): Effect.Effect<number | undefined, ClusterInvalidError> => {
  if (raw === null) return Effect.succeed(undefined)
  const value = raw.trim().replace(/^W\//, '').replace(/^"(.*)"$/, '$1')
  const generation = Number(value)
  return Number.isInteger(generation) && generation > 0
    ? Effect.succeed(generation)
    : Effect.fail(new ClusterInvalidError('invalid If-Match header', [`If-Match: expected a generation, got ${raw}`]))
}

export const createClusterHandlers = ({ runtime }: ClusterHandlerDependencies) => {
  const run = (effect: Effect.Effect<Response, ClusterError, ClusterService>) => runtime.runPromise(respond(effect))

  // Every cluster route acts on behalf of the identity in X-User-Email.
  const withCaller = (request: Request) =>
    Effect.flatMap(ClusterService, (service) =>
      Effect.map(service.authenticate(request.headers.get(USER_HEADER)), (caller) => ({ service, caller })),
    )

  const create = (request: Request) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const body = yield* readJsonBody(request)
        const record = yield* service.createCluster(body, caller)
        return jsonResponse(record, {
          status: 201,
          headers: { location: `/api/v1/clusters/${record.id}`, etag: etag(record.generation) },
        })
      }),
    )

  const list = (request: Request) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const params = new URL(request.url).searchParams
        const result = yield* service.listClusters(
          {
            platform: params.get('platform') ?? undefined,
            phase: params.get('phase') ?? undefined,
            createdBy: params.get('created_by') ?? undefined,
            limit: optionalInt(params.get('limit')),
            offset: optionalInt(params.get('offset')),
          },
          caller,
        )
        return jsonResponse(result)
      }),
    )

  const get = (request: Request, id: string) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const record = yield* service.getCluster(id, caller)
        return jsonResponse(record, { headers: { etag: etag(record.generation) } })
      }),
    )

  const update = (request: Request, id: string) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const body = yield* readJsonBody(request)
        const ifMatch = yield* parseIfMatch(request.headers.get('if-match'))
        const input =
          isRecord(body) && body.expectedGeneration === undefined && ifMatch !== undefined
            ? { ...body, expectedGeneration: ifMatch }
            : body
        const record = yield* service.updateClusterSpec(id, input, caller)
        return jsonResponse(record, { headers: { etag: etag(record.generation) } })
      }),
    )

  const remove = (request: Request, id: string) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const force = new URL(request.url).searchParams.get('force') === 'true'
        const result = yield* service.deleteCluster(id, force, caller)
        return jsonResponse(result, { status: result.removed ? 200 : 202 })
      }),
    )

  const getStatus = (request: Request, id: string) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        return jsonResponse(yield* service.getClusterStatus(id, caller))
      }),
    )

  const pushStatus = (request: Request, id: string) =>
    run(
      Effect.gen(function* () {
        const { service, caller } = yield* withCaller(request)
        const body = yield* readJsonBody(request)
        return jsonResponse(yield* service.pushControllerReport(id, body, caller))
      }),
    )

  return { create, list, get, update, remove, getStatus, pushStatus }
}

export type ClusterHandlers = ReturnType<typeof createClusterHandlers>
