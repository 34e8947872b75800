import type { ClusterListQuery, ClusterMutation, ClusterPage, ClusterRecord } from '@/clusters/types'
import type { StoreKind } from '@/config'

/**
 * Persistence contract shared by the in-memory and Postgres stores. `mutate` is the atomic
 * read-modify-write: `apply` sees the current record and its outcome is written before any other
 * mutation of the same id can read. An error thrown by `apply` aborts the write.
 */
export type ClusterStore = {
  kind: StoreKind
  insert: (record: ClusterRecord) => Promise<void>
  get: (id: string) => Promise<ClusterRecord | null>
  mutate: (id: string, apply: (current: ClusterRecord) => ClusterMutation) => Promise<ClusterMutation | null>
  list: (query: ClusterListQuery) => Promise<ClusterPage>
  ping: () => Promise<void>
  close: () => Promise<void>
}
