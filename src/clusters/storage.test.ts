import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import { ClusterInternalError, ClusterTimeoutError } from '@/clusters/errors'
import { ClusterStorage, makeClusterStorage } from '@/clusters/storage'
import { createMemoryClusterStore } from '@/store/memory'
import type { ClusterStore } from '@/store/types'

const stalledStore = (): ClusterStore => ({
  ...createMemoryClusterStore(),
  get: () => new Promise(() => {}),
  list: async () => {
    throw new Error('connection reset')
  },
})

describe('cluster storage', () => {
  it('bounds every store call by the configured timeout', async () => {
    const storage = makeClusterStorage(stalledStore(), 20)

    const error = await Effect.runPromise(Effect.flip(storage.get('a')))

    expect(error).toBeInstanceOf(ClusterTimeoutError)
    expect(error.message).toBe('store get timed out after 20ms')
    expect(error.retryable).toBe(true)
  })

  it('marks timed out writes as not retryable', async () => {
    const storage = makeClusterStorage({ ...createMemoryClusterStore(), mutate: () => new Promise(() => {}) }, 20)

    const error = await Effect.runPromise(Effect.flip(storage.mutate('a', () => ({ type: 'remove' }))))

    expect(error).toBeInstanceOf(ClusterTimeoutError)
    expect(error.retryable).toBe(false)
    expect(error.message).toBe('store mutate timed out after 20ms; the write may still have been applied')
  })

  it('maps store failures to internal errors', async () => {
    const storage = makeClusterStorage(stalledStore(), 20)

    const error = await Effect.runPromise(Effect.flip(storage.list({ limit: 1, offset: 0 })))

    expect(error).toBeInstanceOf(ClusterInternalError)
    expect(error.message).toBe('store list failed: connection reset')
  })

  it('turns missing records into NotFound', async () => {
    const storage = makeClusterStorage(createMemoryClusterStore(), 20)

    const error = await Effect.runPromise(Effect.flip(storage.mutate('a', () => ({ type: 'remove' }))))

    expect(error.kind).toBe('NotFound')
    expect(error.message).toBe('cluster a not found')
  })

  it('registers under its bare service name', () => {
    expect(ClusterStorage.key).toBe('ClusterStorage')
  })
})
