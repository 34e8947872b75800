import { Effect } from 'effect'

import { ClusterStorage } from '@/clusters/storage'
import { jsonResponse } from '@/routes/http'

export type HealthRuntime = {
  runPromise: <A, E>(effect: Effect.Effect<A, E, ClusterStorage>) => Promise<A>
}

export interface HealthHandlerDependencies {
  runtime: HealthRuntime
}

export const createHealthHandlers = ({ runtime }: HealthHandlerDependencies) => {
  const liveness = () => jsonResponse({ status: 'ok' })

  const readiness = async () => {
    const check = Effect.flatMap(ClusterStorage, (storage) =>
      storage.ping.pipe(
        Effect.as({ status: 'ok', store: storage.kind }),
        Effect.catchAll((error) =>
          Effect.succeed({ status: 'unavailable', store: storage.kind, error: error.message }),
        ),
      ),
    )
    const result = await runtime.runPromise(check)
    return jsonResponse(result, { status: result.status === 'ok' ? 200 : 503 })
  }

  return { liveness, readiness }
}
