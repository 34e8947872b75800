import type { ClusterStatus } from './types'

const isPlainRecord = (value: object): value is Record<string, unknown> => !Array.isArray(value)

export const stableStringify = (value: unknown): string => {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => stableStringify(entry)).join(',')}]`
  }
  if (!isPlainRecord(value)) {
    return 'null'
  }
  const keys = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort()
  return `{${keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(',')}}`
}

const normalizeStatusForCompare = (status: ClusterStatus) => {
  const { lastUpdateTime: _lastUpdateTime, ...rest } = status
  return rest
}

export const shouldApplyStatus = (currentStatus: ClusterStatus | null | undefined, nextStatus: ClusterStatus) =>
  !currentStatus ||
  stableStringify(normalizeStatusForCompare(currentStatus)) !== stableStringify(normalizeStatusForCompare(nextStatus))
