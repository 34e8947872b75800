import { Layer, ManagedRuntime } from 'effect'

import { ReconciliationGatewayLive } from '@/clusters/gateway'
import { ClusterLocksLive } from '@/clusters/locks'
import { ClusterRegistryLive } from '@/clusters/registry'
import { ClusterServiceLive } from '@/clusters/service'
import { ClusterStorageLive } from '@/clusters/storage'
import { AppConfigLayer } from '@/effect/config'
import { AppLoggerLayer } from '@/logger'

/**
 * Cluster services over whatever storage, logger and config layers the caller provides. The
 * gateway and registry share one lock table.
 */
export const ClusterStack = ClusterServiceLive.pipe(
  Layer.provideMerge(Layer.mergeAll(ReconciliationGatewayLive, ClusterRegistryLive)),
  Layer.provideMerge(ClusterLocksLive),
)

export const AppLayer = ClusterStack.pipe(
  Layer.provideMerge(ClusterStorageLive),
  Layer.provideMerge(AppLoggerLayer),
  Layer.provideMerge(AppConfigLayer),
)

export const makeAppRuntime = () => ManagedRuntime.make(AppLayer)

export type AppRuntime = ReturnType<typeof makeAppRuntime>
