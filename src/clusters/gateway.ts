import { Context, Effect, Layer } from 'effect'

import { AppLogger, logRejection } from '@/logger'

import { type Caller, canAccessCluster, ensureCanReportStatus } from './access'
import { type ClusterError, ClusterInternalError, ClusterNotFoundError } from './errors'
import { ClusterLocks } from './locks'
import { applyControllerReport, applySpecUpdate } from './record'
import { ClusterStorage } from './storage'
import { currentIsoTime } from './time'
import type { ClusterPhase, ClusterRecord } from './types'
import { decodeControllerReport, decodeUpdateSpecInput } from './validation'

export type ControllerReportResult = {
  id: string
  generation: number
  phase: ClusterPhase
  controllerName: string
  stale: boolean
  /** True when this report finalized a terminating cluster and the record was removed. */
  removed: boolean
}

export type ReconciliationGatewayService = {
  readonly updateSpec: (id: string, input: unknown, caller: Caller) => Effect.Effect<ClusterRecord, ClusterError>
  /** Only controller identities may push reports; they reach every cluster. */
  readonly pushControllerReport: (
    id: string,
    input: unknown,
    caller: Caller,
  ) => Effect.Effect<ControllerReportResult, ClusterError>
}

export class ReconciliationGateway extends Context.Tag('ReconciliationGateway')<
  ReconciliationGateway,
  ReconciliationGatewayService
>() {}

export const ReconciliationGatewayLive = Layer.effect(
  ReconciliationGateway,
  Effect.gen(function* () {
    const storage = yield* ClusterStorage
    const locks = yield* ClusterLocks
    const logger = yield* AppLogger

    const updateSpec: ReconciliationGatewayService['updateSpec'] = (id, input, caller) =>
      Effect.gen(function* () {
        const { spec, expectedGeneration } = yield* decodeUpdateSpecInput(input)
        const now = yield* currentIsoTime
        const mutation = yield* locks.withLock(
          id,
          storage.mutate(id, (current) => {
            if (!canAccessCluster(caller, current)) throw new ClusterNotFoundError(id)
            return { type: 'replace', record: applySpecUpdate(current, spec, expectedGeneration, now) }
          }),
        )
        if (mutation.type !== 'replace') {
          return yield* Effect.fail(new ClusterInternalError(`spec update removed cluster ${id}`))
        }
        const record = mutation.record
        yield* logger.info('cluster spec updated', {
          clusterId: id,
          generation: record.generation,
          phase: record.status.phase,
        })
        return record
      }).pipe(
        Effect.tapError((error) => logRejection(logger, 'cluster spec update rejected', error, { clusterId: id })),
      )

    const pushControllerReport: ReconciliationGatewayService['pushControllerReport'] = (id, input, caller) =>
      Effect.gen(function* () {
        yield* ensureCanReportStatus(caller)
        const report = yield* decodeControllerReport(input)
        const now = yield* currentIsoTime
        const mutation = yield* locks.withLock(
          id,
          storage.mutate(id, (current) => applyControllerReport(current, report, now)),
        )

        // Removal requires every report to be finalized at the current generation.
        const result: ControllerReportResult =
          mutation.type === 'replace'
            ? {
                id,
                generation: mutation.record.generation,
                phase: mutation.record.status.phase,
                controllerName: report.controllerName,
                stale: report.observedGeneration < mutation.record.generation,
                removed: false,
              }
            : {
                id,
                generation: report.observedGeneration,
                phase: 'Terminating',
                controllerName: report.controllerName,
                stale: false,
                removed: true,
              }

        yield* logger.info(result.removed ? 'cluster finalized and removed' : 'controller report stored', {
          clusterId: id,
          controllerName: result.controllerName,
          observedGeneration: report.observedGeneration,
          generation: result.generation,
          phase: result.phase,
          stale: result.stale,
        })
        return result
      }).pipe(
        Effect.tapError((error) =>
          logRejection(logger, 'controller report rejected', error, { clusterId: id, caller: caller.email }),
        ),
      )

    return { updateSpec, pushControllerReport }
  }),
)
