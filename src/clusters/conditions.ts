import type { ClusterPhase, Condition, ConditionStatus } from './types'

export type ConditionUpdate = {
  type: string
  status: ConditionStatus
  reason?: string
  message?: string
  lastTransitionTime?: string
}

/** Condition types that mark a controller as serving its share of the cluster. */
export const AVAILABLE_CONDITION_TYPES = ['Available', 'Ready'] as const

export const FINALIZED_CONDITION_TYPE = 'Finalized'

const defaultNowIso = () => new Date().toISOString()

const normalizeConditionUpdate = (update: ConditionUpdate) => ({
  type: update.type,
  status: update.status,
  reason: update.reason?.trim() || 'Reconciled',
  message: update.message ?? '',
})

export const hasTrueCondition = (conditions: readonly Condition[], types: readonly string[]) =>
  conditions.some((condition) => condition.status === 'True' && types.includes(condition.type))

export const findDuplicateConditionTypes = (conditions: readonly { type: string }[]) => {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const condition of conditions) {
    if (seen.has(condition.type)) {
      duplicates.add(condition.type)
    }
    seen.add(condition.type)
  }
  return [...duplicates]
}

/**
 * Upserts one condition, moving `lastTransitionTime` only when status, reason or message change.
 */
export const upsertCondition = (
  conditions: readonly Condition[],
  update: ConditionUpdate,
  nowIso: () => string = defaultNowIso,
): Condition[] => {
  const next = [...conditions]
  const normalized = normalizeConditionUpdate(update)
  const index = next.findIndex((cond) => cond.type === normalized.type)
  if (index === -1) {
    next.push({ ...normalized, lastTransitionTime: update.lastTransitionTime ?? nowIso() })
    return next
  }
  const existing = next[index]
  if (
    existing &&
    (existing.status !== normalized.status ||
      existing.reason !== normalized.reason ||
      existing.message !== normalized.message)
  ) {
    next[index] = { ...existing, ...normalized, lastTransitionTime: update.lastTransitionTime ?? nowIso() }
  }
  return next
}

/**
 * Resolves the conditions of a fresh controller report against the ones it sent last time. The
 * reported order is kept. A condition without a transition time inherits the previous one while
 * its status holds.
 */
export const mergeReportedConditions = (
  previous: readonly Condition[],
  incoming: readonly ConditionUpdate[],
  nowIso: () => string = defaultNowIso,
): Condition[] =>
  incoming.map((update) => {
    const normalized = normalizeConditionUpdate(update)
    if (update.lastTransitionTime) {
      return { ...normalized, lastTransitionTime: update.lastTransitionTime }
    }
    const prior = previous.find((condition) => condition.type === normalized.type)
    const lastTransitionTime = prior && prior.status === normalized.status ? prior.lastTransitionTime : nowIso()
    return { ...normalized, lastTransitionTime }
  })

type AggregateSummary = {
  phase: ClusterPhase
  reason: string
  message: string
}

/** Maps the cluster phase onto the standard Ready, Progressing and Degraded conditions. */
export const deriveAggregateConditions = (
  previous: readonly Condition[],
  summary: AggregateSummary,
  nowIso: () => string = defaultNowIso,
): Condition[] => {
  const flag = (value: boolean): ConditionStatus => (value ? 'True' : 'False')
  const progressing = summary.phase === 'Pending' || summary.phase === 'Progressing' || summary.phase === 'Terminating'
  const updates: ConditionUpdate[] = [
    { type: 'Ready', status: flag(summary.phase === 'Ready') },
    { type: 'Progressing', status: flag(progressing) },
    { type: 'Degraded', status: flag(summary.phase === 'Failed') },
  ]
  return updates.reduce<Condition[]>(
    (conditions, update) =>
      upsertCondition(conditions, { ...update, reason: summary.reason, message: summary.message }, nowIso),
    previous.filter((condition) => updates.some((update) => update.type === condition.type)),
  )
}
