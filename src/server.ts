import { createApp, createRouter, defineEventHandler, getRouterParam, type H3Event, toWebRequest } from 'h3'

import { type ClusterRuntime, createClusterHandlers } from '@/routes/clusters'
import { createHealthHandlers, type HealthRuntime } from '@/routes/health'

export type ServerRuntime = ClusterRuntime & HealthRuntime

const requireParam = (event: H3Event, name: string) => getRouterParam(event, name, { decode: true }) ?? ''

export const createServerApp = (runtime: ServerRuntime) => {
  const clusters = createClusterHandlers({ runtime })
  const health = createHealthHandlers({ runtime })

  const router = createRouter()
    .get(
      '/health/liveness',
      defineEventHandler(() => health.liveness()),
    )
    .get(
      '/health/readiness',
      defineEventHandler(() => health.readiness()),
    )
    .post(
      '/api/v1/clusters',
      defineEventHandler((event) => clusters.create(toWebRequest(event))),
    )
    .get(
      '/api/v1/clusters',
      defineEventHandler((event) => clusters.list(toWebRequest(event))),
    )
    .get(
      '/api/v1/clusters/:id',
      defineEventHandler((event) => clusters.get(toWebRequest(event), requireParam(event, 'id'))),
    )
    .put(
      '/api/v1/clusters/:id',
      defineEventHandler((event) => clusters.update(toWebRequest(event), requireParam(event, 'id'))),
    )
    .delete(
      '/api/v1/clusters/:id',
      defineEventHandler((event) => clusters.remove(toWebRequest(event), requireParam(event, 'id'))),
    )
    .get(
      '/api/v1/clusters/:id/status',
      defineEventHandler((event) => clusters.getStatus(toWebRequest(event), requireParam(event, 'id'))),
    )
    .put(
      '/api/v1/clusters/:id/status',
      defineEventHandler((event) => clusters.pushStatus(toWebRequest(event), requireParam(event, 'id'))),
    )

  const app = createApp()
  app.use(router)
  return app
}
