import { aggregate, isStaleReport } from './aggregator'
import {
  type ConditionUpdate,
  deriveAggregateConditions,
  FINALIZED_CONDITION_TYPE,
  hasTrueCondition,
  mergeReportedConditions,
} from './conditions'
import { ClusterConflictError, ClusterInvalidError } from './errors'
import { shouldApplyStatus } from './status-utils'
import type {
  ClusterMutation,
  ClusterRecord,
  ClusterSpec,
  ClusterStatus,
  ClusterStatusView,
  ControllerError,
  ControllerReport,
} from './types'

export type NewClusterRecord = {
  id: string
  name: string
  spec: ClusterSpec
  createdBy: string
  now: string
}

export type ControllerReportInput = {
  controllerName: string
  observedGeneration: number
  conditions: readonly ConditionUpdate[]
  metadata?: Readonly<Record<string, unknown>>
  lastError?: ControllerError | null
}

type RecordWithoutStatus = Omit<ClusterRecord, 'status'>

const isFinalizedReport = (report: ControllerReport, generation: number) =>
  report.observedGeneration === generation && hasTrueCondition(report.conditions, [FINALIZED_CONDITION_TYPE])

const finalizationProgress = (record: RecordWithoutStatus) => {
  const reports = Object.values(record.reports)
  return {
    total: reports.length,
    finalized: reports.filter((report) => isFinalizedReport(report, record.generation)).length,
  }
}

/** A terminating cluster can be removed once every controller that ever reported has finalized. */
export const isFinalized = (record: RecordWithoutStatus) => {
  const { total, finalized } = finalizationProgress(record)
  return finalized === total
}

const computeStatus = (record: RecordWithoutStatus, previous: ClusterStatus | null, now: string): ClusterStatus => {
  const summary = aggregate(record.generation, Object.values(record.reports))
  let overlay: Pick<ClusterStatus, 'phase' | 'reason' | 'message'> = summary
  if (record.deletionRequestedAt !== null) {
    const { total, finalized } = finalizationProgress(record)
    overlay = {
      phase: 'Terminating',
      reason: 'DeletionRequested',
      message: `deletion requested, ${finalized} of ${total} controllers finalized`,
    }
  }

  const next: ClusterStatus = {
    phase: overlay.phase,
    reason: overlay.reason,
    message: overlay.message,
    observedGeneration: summary.observedGeneration,
    conditions: deriveAggregateConditions(previous?.conditions ?? [], overlay, () => now),
    lastUpdateTime: now,
  }
  return previous && !shouldApplyStatus(previous, next) ? previous : next
}

export const createClusterRecord = ({ id, name, spec, createdBy, now }: NewClusterRecord): ClusterRecord => {
  const base: RecordWithoutStatus = {
    id,
    name,
    spec,
    generation: 1,
    createdBy,
    createdAt: now,
    updatedAt: now,
    deletionRequestedAt: null,
    reports: {},
  }
  return { ...base, status: computeStatus(base, null, now) }
}

/** Recomputes the aggregate from the stored reports; status is returned as-is when nothing moved. */
export const refreshStatus = (record: ClusterRecord, now: string): ClusterRecord => ({
  ...record,
  status: computeStatus(record, record.status, now),
})

export const applySpecUpdate = (
  record: ClusterRecord,
  spec: ClusterSpec,
  expectedGeneration: number | undefined,
  now: string,
): ClusterRecord => {
  if (record.deletionRequestedAt !== null) {
    throw new ClusterConflictError(`cluster ${record.id} is terminating`, record)
  }
  if (expectedGeneration !== undefined && expectedGeneration !== record.generation) {
    throw new ClusterConflictError(
      `generation mismatch: expected ${expectedGeneration}, current ${record.generation}`,
      record,
    )
  }
  return refreshStatus({ ...record, spec, generation: record.generation + 1, updatedAt: now }, now)
}

export const applyControllerReport = (
  record: ClusterRecord,
  input: ControllerReportInput,
  now: string,
): ClusterMutation => {
  if (input.observedGeneration > record.generation) {
    throw new ClusterInvalidError(
      `controller ${input.controllerName} reported generation ${input.observedGeneration} ahead of cluster generation ${record.generation}`,
      [`observedGeneration must be at most ${record.generation}`],
    )
  }

  const previous = record.reports[input.controllerName]
  const report: ControllerReport = {
    controllerName: input.controllerName,
    observedGeneration: input.observedGeneration,
    conditions: mergeReportedConditions(previous?.conditions ?? [], input.conditions, () => now),
    metadata: input.metadata ?? {},
    lastError: input.lastError ?? null,
    receivedAt: now,
  }
  const next = refreshStatus(
    { ...record, reports: { ...record.reports, [input.controllerName]: report }, updatedAt: now },
    now,
  )
  if (next.deletionRequestedAt !== null && isFinalized(next)) {
    return { type: 'remove' }
  }
  return { type: 'replace', record: next }
}

/** Marks a cluster for graceful deletion. A repeated request leaves the record untouched. */
export const requestDeletion = (record: ClusterRecord, now: string): ClusterMutation => {
  if (record.deletionRequestedAt !== null) {
    return { type: 'replace', record }
  }
  const marked = { ...record, deletionRequestedAt: now, updatedAt: now }
  if (isFinalized(marked)) {
    return { type: 'remove' }
  }
  return { type: 'replace', record: refreshStatus(marked, now) }
}

const compareNames = (left: string, right: string) => (left < right ? -1 : left > right ? 1 : 0)

export const toStatusView = (record: ClusterRecord): ClusterStatusView => {
  const { counts } = aggregate(record.generation, Object.values(record.reports))
  const controllers = Object.values(record.reports)
    .sort((a, b) => compareNames(a.controllerName, b.controllerName))
    .map((report) => ({ ...report, stale: isStaleReport(report, record.generation) }))
  return {
    id: record.id,
    name: record.name,
    generation: record.generation,
    phase: record.status.phase,
    reason: record.status.reason,
    message: record.status.message,
    observedGeneration: record.status.observedGeneration,
    conditions: record.status.conditions,
    controllers,
    counts,
    lastUpdateTime: record.status.lastUpdateTime,
  }
}
