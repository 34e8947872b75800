import { Context, Effect, Layer } from 'effect'

import { type AppConfig, loadConfig } from '@/config'

export type { AppConfig } from '@/config'

export class AppConfigService extends Context.Tag('AppConfig')<AppConfigService, AppConfig>() {}

export const AppConfigLayer = Layer.effect(
  AppConfigService,
  Effect.try({
    try: () => loadConfig(),
    catch: (error) => (error instanceof Error ? error : new Error(String(error))),
  }),
)

export const makeAppConfigLayer = (config: AppConfig) => Layer.succeed(AppConfigService, config)
