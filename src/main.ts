import { createServer } from 'node:http'

import { Effect } from 'effect'
import { toNodeListener } from 'h3'

import { AppConfigService } from '@/effect/config'
import { makeAppRuntime } from '@/effect/runtime'
import { AppLogger } from '@/logger'
import { createServerApp } from '@/server'

const main = async () => {
  const runtime = makeAppRuntime()
  const log = (message: string, fields?: Record<string, unknown>) =>
    runtime.runPromise(Effect.flatMap(AppLogger, (logger) => logger.info(message, fields)))

  const config = await runtime.runPromise(AppConfigService)
  const server = createServer(toNodeListener(createServerApp(runtime)))

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(config.port, () => resolve())
  })
  await log('ordu listening', { port: config.port, store: config.store.kind, deletionMode: config.deletion.mode })

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    await log('shutting down', { signal })
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
    await runtime.dispose()
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('ordu failed to shut down cleanly', error)
          process.exit(1)
        },
      )
    })
  }
}

main().catch((error: unknown) => {
  console.error('ordu failed to start', error)
  process.exit(1)
})
