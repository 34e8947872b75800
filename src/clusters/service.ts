import { Context, Duration, Effect, Layer } from 'effect'

import { AppConfigService } from '@/effect/config'
import { AppLogger } from '@/logger'

import { type Caller, resolveCaller } from './access'
import { type ClusterError, ClusterInvalidError, ClusterTimeoutError, type ClusterUnauthorizedError } from './errors'
import { type ControllerReportResult, ReconciliationGateway } from './gateway'
import { toStatusView } from './record'
import { type ClusterListResult, ClusterRegistry, type DeleteClusterResult, type ListClustersInput } from './registry'
import type { ClusterPhase, ClusterRecord, ClusterStatusView } from './types'

export type AwaitPhaseOptions = {
  timeoutMs?: number
  intervalMs?: number
}

const DEFAULT_AWAIT_TIMEOUT_MS = 30_000
const DEFAULT_AWAIT_INTERVAL_MS = 500

export type ClusterServiceApi = {
  /** Resolves the caller behind a request from its identity header value. */
  readonly authenticate: (identity: string | null | undefined) => Effect.Effect<Caller, ClusterUnauthorizedError>
  readonly createCluster: (input: unknown, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  readonly getCluster: (id: string, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  readonly updateClusterSpec: (id: string, input: unknown, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  readonly deleteCluster: (
    id: string,
    force: boolean,
    caller: Caller,
  ) => Effect.Effect<DeleteClusterResult, ClusterError>
  readonly getClusterStatus: (id: string, caller: Caller) => Effect.Effect<ClusterStatusView, ClusterError>
  readonly pushControllerReport: (
    id: string,
    input: unknown,
    caller: Caller,
  ) => Effect.Effect<ControllerReportResult, ClusterError>
  readonly listClusters: (input: ListClustersInput, caller: Caller) => Effect.Effect<ClusterListResult, ClusterError>
  /**
   * Polls until the cluster reaches one of `phases`. A cluster that reaches `Failed` is returned
   * as well.
   */
  readonly awaitPhase: (
    id: string,
    phases: readonly ClusterPhase[],
    caller: Caller,
    options?: AwaitPhaseOptions,
  ) => Effect.Effect<ClusterRecord, ClusterError>
}

export class ClusterService extends Context.Tag('ClusterService')<ClusterService, ClusterServiceApi>() {}

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0

export const ClusterServiceLive = Layer.effect(
  ClusterService,
  Effect.gen(function* () {
    const config = yield* AppConfigService
    const registry = yield* ClusterRegistry
    const gateway = yield* ReconciliationGateway
    const logger = yield* AppLogger

    const awaitPhase: ClusterServiceApi['awaitPhase'] = (id, phases, caller, options = {}) => {
      const timeoutMs = options.timeoutMs ?? DEFAULT_AWAIT_TIMEOUT_MS
      const intervalMs = options.intervalMs ?? DEFAULT_AWAIT_INTERVAL_MS
      const issues = [
        phases.length === 0 ? 'phases: must name at least one phase' : null,
        isPositiveInteger(timeoutMs) ? null : 'timeoutMs: must be a positive integer',
        isPositiveInteger(intervalMs) ? null : 'intervalMs: must be a positive integer',
      ].filter((issue): issue is string => issue !== null)
      if (issues.length > 0) {
        return Effect.fail(new ClusterInvalidError('invalid await request', issues))
      }

      const targets = new Set<ClusterPhase>(phases)
      const poll = Effect.gen(function* () {
        while (true) {
          const record = yield* registry.get(id, caller)
          if (targets.has(record.status.phase) || record.status.phase === 'Failed') {
            return record
          }
          yield* logger.debug('waiting for cluster phase', {
            clusterId: id,
            phase: record.status.phase,
            targets: [...targets],
          })
          yield* Effect.sleep(Duration.millis(intervalMs))
        }
      })

      return poll.pipe(
        Effect.timeoutFail({
          duration: Duration.millis(timeoutMs),
          onTimeout: () =>
            new ClusterTimeoutError(`waiting for cluster ${id} to reach ${[...targets].join('|')}`, timeoutMs),
        }),
      )
    }

    return {
      authenticate: (identity) => resolveCaller(identity, config.access.controllerIdentities),
      createCluster: registry.create,
      getCluster: registry.get,
      updateClusterSpec: gateway.updateSpec,
      deleteCluster: registry.remove,
      getClusterStatus: (id, caller) => Effect.map(registry.get(id, caller), toStatusView),
      pushControllerReport: gateway.pushControllerReport,
      listClusters: registry.list,
      awaitPhase,
    }
  }),
)
