import { randomUUID } from 'node:crypto'

import { Context, Effect, Either, Layer } from 'effect'

import { AppConfigService } from '@/effect/config'
import { AppLogger, logRejection } from '@/logger'

import { type Caller, canAccessCluster, scopeCreatedBy } from './access'
import { type ClusterError, ClusterConflictError, ClusterInvalidError, ClusterNotFoundError } from './errors'
import { ClusterLocks } from './locks'
import { createClusterRecord, requestDeletion } from './record'
import { ClusterStorage } from './storage'
import { currentIsoTime } from './time'
import { CLUSTER_PHASES, type ClusterPhase, type ClusterRecord } from './types'
import { decodeCreateClusterInput } from './validation'

export type ListClustersInput = {
  platform?: string
  phase?: string
  createdBy?: string
  limit?: number
  offset?: number
}

export type ClusterListResult = {
  records: readonly ClusterRecord[]
  total: number
  limit: number
  offset: number
}

export type DeleteClusterResult = {
  id: string
  removed: boolean
  phase: ClusterPhase
}

export type ClusterRegistryService = {
  readonly create: (input: unknown, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  /** Clusters the caller may not access read as NotFound. */
  readonly get: (id: string, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  readonly list: (input: ListClustersInput, caller: Caller) => Effect.Effect<ClusterListResult, ClusterError>
  readonly remove: (id: string, force: boolean, caller: Caller) => Effect.Effect<DeleteClusterResult, ClusterError>
}

export class ClusterRegistry extends Context.Tag('ClusterRegistry')<ClusterRegistry, ClusterRegistryService>() {}

const isClusterPhase = (value: string): value is ClusterPhase => CLUSTER_PHASES.some((phase) => phase === value)

const resolvePage = (
  input: ListClustersInput,
  defaultLimit: number,
  maxLimit: number,
): Either.Either<{ limit: number; offset: number }, ClusterInvalidError> => {
  const issues: string[] = []
  const { limit, offset = 0, phase } = input
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    issues.push('limit: must be a non-negative integer')
  }
  if (!Number.isInteger(offset) || offset < 0) {
    issues.push('offset: must be a non-negative integer')
  }
  if (phase && !isClusterPhase(phase)) {
    issues.push(`phase: must be one of ${CLUSTER_PHASES.join(', ')}`)
  }
  if (issues.length > 0) {
    return Either.left(new ClusterInvalidError('invalid list query', issues))
  }
  return Either.right({
    limit: limit === undefined || limit === 0 ? defaultLimit : Math.min(limit, maxLimit),
    offset,
  })
}

export const ClusterRegistryLive = Layer.effect(
  ClusterRegistry,
  Effect.gen(function* () {
    const config = yield* AppConfigService
    const storage = yield* ClusterStorage
    const locks = yield* ClusterLocks
    const logger = yield* AppLogger

    const create: ClusterRegistryService['create'] = (input, caller) =>
      Effect.gen(function* () {
        const { name, spec } = yield* decodeCreateClusterInput(input)
        const createdBy = caller.email
        const now = yield* currentIsoTime
        const record = createClusterRecord({ id: randomUUID(), name, spec, createdBy, now })
        yield* storage.insert(record)
        yield* logger.info('cluster created', {
          clusterId: record.id,
          name,
          platform: spec.platform.type,
          createdBy,
          generation: record.generation,
        })
        return record
      })

    const get: ClusterRegistryService['get'] = (id, caller) =>
      storage.get(id).pipe(
        Effect.filterOrFail(
          (record) => canAccessCluster(caller, record),
          () => new ClusterNotFoundError(id),
        ),
      )

    const list: ClusterRegistryService['list'] = (input, caller) =>
      Effect.gen(function* () {
        const page = yield* resolvePage(input, config.list.defaultLimit, config.list.maxLimit)
        const phase = input.phase && isClusterPhase(input.phase) ? input.phase : undefined
        const { records, total } = yield* storage.list({
          platform: input.platform || undefined,
          phase,
          createdBy: scopeCreatedBy(caller, input.createdBy),
          limit: page.limit,
          offset: page.offset,
        })
        return { records, total, limit: page.limit, offset: page.offset }
      })

    const remove: ClusterRegistryService['remove'] = (id, force, caller) =>
      Effect.gen(function* () {
        const now = yield* currentIsoTime
        const seen: { phase?: ClusterPhase } = {}
        const mutation = yield* locks.withLock(
          id,
          storage.mutate(id, (current) => {
            if (!canAccessCluster(caller, current)) throw new ClusterNotFoundError(id)
            seen.phase = current.status.phase
            if (force) return { type: 'remove' }
            if (current.status.phase === 'Progressing') {
              throw new ClusterConflictError(
                `cluster ${id} is reconciling; retry once it settles or delete with force=true`,
                current,
              )
            }
            return config.deletion.mode === 'graceful' ? requestDeletion(current, now) : { type: 'remove' }
          }),
        )

        const result: DeleteClusterResult =
          mutation.type === 'remove'
            ? { id, removed: true, phase: seen.phase ?? 'Terminating' }
            : { id, removed: false, phase: mutation.record.status.phase }
        yield* logger.info(result.removed ? 'cluster deleted' : 'cluster deletion requested', {
          clusterId: id,
          force,
          caller: caller.email,
          mode: config.deletion.mode,
          phase: result.phase,
        })
        return result
      }).pipe(
        Effect.tapError((error) => logRejection(logger, 'cluster deletion rejected', error, { clusterId: id, force })),
      )

    return { create, get, list, remove }
  }),
)
