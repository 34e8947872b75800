import { Context, Duration, Effect, Layer } from 'effect'

import type { StoreKind } from '@/config'
import { AppConfigService } from '@/effect/config'
import { AppLogger } from '@/logger'
import { createMemoryClusterStore } from '@/store/memory'
import { createPostgresClusterStore } from '@/store/postgres'
import type { ClusterStore } from '@/store/types'

import { type ClusterError, ClusterNotFoundError, ClusterTimeoutError, toClusterError } from './errors'
import type { ClusterListQuery, ClusterMutation, ClusterPage, ClusterRecord } from './types'

export type ClusterStorageService = {
  readonly kind: StoreKind
  readonly insert: (record: ClusterRecord) => Effect.Effect<void, ClusterError>
  readonly get: (id: string) => Effect.Effect<ClusterRecord, ClusterError>
  /** Atomic read-modify-write of one cluster; fails with NotFound when the id is unknown. */
  readonly mutate: (
    id: string,
    apply: (current: ClusterRecord) => ClusterMutation,
  ) => Effect.Effect<ClusterMutation, ClusterError>
  readonly list: (query: ClusterListQuery) => Effect.Effect<ClusterPage, ClusterError>
  readonly ping: Effect.Effect<void, ClusterError>
}

export class ClusterStorage extends Context.Tag('ClusterStorage')<ClusterStorage, ClusterStorageService>() {}

export const makeClusterStorage = (store: ClusterStore, timeoutMs: number): ClusterStorageService => {
  // A write that outlives its deadline keeps running in the store, so retrying it is not safe.
  const run = <A>(operation: string, call: () => Promise<A>, options: { write?: boolean } = {}) =>
    Effect.tryPromise({
      try: call,
      catch: (error) => toClusterError(`store ${operation}`, error),
    }).pipe(
      Effect.timeoutFail({
        duration: Duration.millis(timeoutMs),
        onTimeout: () => new ClusterTimeoutError(`store ${operation}`, timeoutMs, { retryable: !options.write }),
      }),
    )

  const required = <A>(id: string, effect: Effect.Effect<A | null, ClusterError>) =>
    Effect.flatMap(effect, (value) =>
      value === null ? Effect.fail(new ClusterNotFoundError(id)) : Effect.succeed(value),
    )

  return {
    kind: store.kind,
    insert: (record) => run('insert', () => store.insert(record), { write: true }),
    get: (id) => required(id, run('get', () => store.get(id))),
    mutate: (id, apply) => required(id, run('mutate', () => store.mutate(id, apply), { write: true })),
    list: (query) => run('list', () => store.list(query)),
    ping: run('ping', () => store.ping()),
  }
}

const openStore = Effect.gen(function* () {
  const config = yield* AppConfigService
  return yield* Effect.try({
    try: (): ClusterStore =>
      config.store.kind === 'postgres'
        ? createPostgresClusterStore({
            url: config.store.databaseUrl ?? undefined,
            migrations: config.store.migrations,
            statementTimeoutMs: config.store.timeoutMs,
          })
        : createMemoryClusterStore(),
    catch: (error) => toClusterError('open cluster store', error),
  })
})

export const ClusterStorageLive = Layer.scoped(
  ClusterStorage,
  Effect.gen(function* () {
    const config = yield* AppConfigService
    const logger = yield* AppLogger
    const store = yield* openStore

    yield* Effect.addFinalizer(() =>
      Effect.tryPromise(() => store.close()).pipe(
        Effect.catchAll((error) =>
          logger.warn('failed to close cluster store', { store: store.kind, error: String(error) }),
        ),
      ),
    )
    yield* logger.info('cluster store opened', { store: store.kind, timeoutMs: config.store.timeoutMs })

    return makeClusterStorage(store, config.store.timeoutMs)
  }),
)

export const makeClusterStorageLayer = (store: ClusterStore, timeoutMs = 5000) =>
  Layer.succeed(ClusterStorage, makeClusterStorage(store, timeoutMs))
