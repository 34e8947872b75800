import { Context, Effect, Layer } from 'effect'

export type ClusterLocksService = {
  /** Runs `effect` while holding the lock for `key`; other keys never wait on it. */
  readonly withLock: <A, E, R>(key: string, effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>
  /** Number of keys with a holder or waiter. */
  readonly size: Effect.Effect<number>
}

export class ClusterLocks extends Context.Tag('ClusterLocks')<ClusterLocks, ClusterLocksService>() {}

type LockEntry = {
  readonly semaphore: Effect.Semaphore
  holders: number
}

export const makeClusterLocks = (): ClusterLocksService => {
  const entries = new Map<string, LockEntry>()

  const acquire = (key: string) =>
    Effect.sync(() => {
      let entry = entries.get(key)
      if (!entry) {
        entry = { semaphore: Effect.unsafeMakeSemaphore(1), holders: 0 }
        entries.set(key, entry)
      }
      entry.holders += 1
      return entry
    })

  // The entry is dropped only once nobody holds or waits on it.
  const release = (key: string, entry: LockEntry) =>
    Effect.sync(() => {
      entry.holders -= 1
      if (entry.holders === 0 && entries.get(key) === entry) {
        entries.delete(key)
      }
    })

  return {
    withLock: (key, effect) =>
      Effect.acquireUseRelease(
        acquire(key),
        (entry) => entry.semaphore.withPermits(1)(effect),
        (entry) => release(key, entry),
      ),
    size: Effect.sync(() => entries.size),
  }
}

export const ClusterLocksLive = Layer.sync(ClusterLocks, makeClusterLocks)
