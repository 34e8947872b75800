import type { ClusterFilter, ClusterRecord } from '@/clusters/types'
import type { ClusterStore } from '@/store/types'

const compareRecords = (left: ClusterRecord, right: ClusterRecord) => {
  if (left.createdAt !== right.createdAt) return left.createdAt < right.createdAt ? -1 : 1
  if (left.id !== right.id) return left.id < right.id ? -1 : 1
  return 0
}

const matchesFilter = (record: ClusterRecord, filter: ClusterFilter) =>
  (!filter.platform || record.spec.platform.type === filter.platform) &&
  (!filter.phase || record.status.phase === filter.phase) &&
  (!filter.createdBy || record.createdBy === filter.createdBy)

export const createMemoryClusterStore = (): ClusterStore => {
  const records = new Map<string, ClusterRecord>()

  const insert: ClusterStore['insert'] = async (record) => {
    if (records.has(record.id)) {
      throw new Error(`cluster ${record.id} already exists`)
    }
    records.set(record.id, record)
  }

  const get: ClusterStore['get'] = async (id) => records.get(id) ?? null

  // Read, apply and write happen in one synchronous step, so no other mutation interleaves.
  const mutate: ClusterStore['mutate'] = async (id, apply) => {
    const current = records.get(id)
    if (!current) return null
    const mutation = apply(current)
    if (mutation.type === 'remove') {
      records.delete(id)
    } else {
      records.set(id, mutation.record)
    }
    return mutation
  }

  const list: ClusterStore['list'] = async ({ limit, offset, ...filter }) => {
    const matching = [...records.values()].filter((record) => matchesFilter(record, filter)).sort(compareRecords)
    return { records: matching.slice(offset, offset + limit), total: matching.length }
  }

  return {
    kind: 'memory',
    insert,
    get,
    mutate,
    list,
    ping: async () => {},
    close: async () => {
      records.clear()
    },
  }
}
