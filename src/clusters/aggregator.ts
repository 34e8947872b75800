import { AVAILABLE_CONDITION_TYPES, hasTrueCondition } from './conditions'
import type { ClusterPhase, ControllerCounts, ControllerReport } from './types'

export type AggregateStatus = {
  phase: Exclude<ClusterPhase, 'Terminating'>
  reason: string
  message: string
  observedGeneration: number
  counts: ControllerCounts
}

const compareNames = (left: string, right: string) => (left < right ? -1 : left > right ? 1 : 0)

export const isStaleReport = (report: Pick<ControllerReport, 'observedGeneration'>, generation: number) =>
  report.observedGeneration < generation

export const isAvailableReport = (report: Pick<ControllerReport, 'conditions'>) =>
  hasTrueCondition(report.conditions, AVAILABLE_CONDITION_TYPES)

/**
 * Folds the latest report of every controller into one phase. Reports are sorted by controller
 * name first, so any permutation of the same set yields the same result.
 */
export const aggregate = (generation: number, reports: readonly ControllerReport[]): AggregateStatus => {
  const sorted = [...reports].sort((a, b) => compareNames(a.controllerName, b.controllerName))
  const current = sorted.filter((report) => !isStaleReport(report, generation))
  const stale = sorted.filter((report) => isStaleReport(report, generation)).map((report) => report.controllerName)
  const failing = current.filter((report) => report.lastError !== null)
  const available = current.filter(isAvailableReport)

  const total = sorted.length
  const counts: ControllerCounts = {
    total,
    reconciled: current.length,
    available: available.length,
    failed: failing.length,
    stale,
  }
  const observedGeneration =
    total === 0 ? 0 : sorted.reduce((lowest, report) => Math.min(lowest, report.observedGeneration), generation)

  const result = (phase: AggregateStatus['phase'], reason: string, message: string): AggregateStatus => ({
    phase,
    reason,
    message,
    observedGeneration,
    counts,
  })

  if (total === 0) {
    return result('Pending', 'NoControllers', 'awaiting controller reconciliation')
  }

  const [firstFailure] = failing
  if (firstFailure?.lastError) {
    return result(
      'Failed',
      'ControllerError',
      `controller ${firstFailure.controllerName} failed: ${firstFailure.lastError.message}`,
    )
  }

  if (stale.length > 0) {
    return result('Progressing', 'ControllersReconciling', `${current.length} of ${total} controllers reconciled`)
  }

  if (available.length === total) {
    return result('Ready', 'ControllersAvailable', `${total} of ${total} controllers available`)
  }

  return result('Progressing', 'ControllersNotAvailable', `${available.length} of ${total} controllers available`)
}
