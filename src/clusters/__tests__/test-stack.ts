import { Layer, ManagedRuntime } from 'effect'

import type { Caller } from '@/clusters/access'
import { makeClusterStorageLayer } from '@/clusters/storage'
import { loadConfig } from '@/config'
import { makeAppConfigLayer } from '@/effect/config'
import { ClusterStack } from '@/effect/runtime'
import { SilentLoggerLayer } from '@/logger'
import { createMemoryClusterStore } from '@/store/memory'
import type { ClusterStore } from '@/store/types'

type TestStackOptions = {
  env?: NodeJS.ProcessEnv
  store?: ClusterStore
}

export const makeTestRuntime = (options: TestStackOptions = {}) => {
  const config = loadConfig(options.env ?? {})
  const store = options.store ?? createMemoryClusterStore()
  const layer = ClusterStack.pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        makeClusterStorageLayer(store, config.store.timeoutMs),
        SilentLoggerLayer,
        makeAppConfigLayer(config),
      ),
    ),
  )
  return { runtime: ManagedRuntime.make(layer), store, config }
}

export const gcpSpec = (region = 'us-central1') => ({ platform: { type: 'gcp', region } })

export const availableReport = (controllerName: string, observedGeneration: number) => ({
  controllerName,
  observedGeneration,
  conditions: [{ type: 'Available', status: 'True', reason: 'Provisioned' }],
})

export const userCaller = (email: string): Caller => ({ email, isController: false })

export const owner = userCaller('ops@example.com')

export const controller: Caller = { email: 'controller@system.local', isController: true }
