import { Context, Effect, Layer } from 'effect'
import pino, { type Logger } from 'pino'

import { AppConfigService } from '@/effect/config'

export type LogFields = Record<string, unknown>

export interface AppLoggerService {
  readonly debug: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly info: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly warn: (message: string, fields?: LogFields) => Effect.Effect<void>
  readonly error: (message: string, fields?: LogFields) => Effect.Effect<void>
}

export class AppLogger extends Context.Tag('AppLogger')<AppLogger, AppLoggerService>() {}

export const createPinoLogger = (level: string) =>
  pino({
    level,
    base: {
      service: process.env.ORDU_SERVICE_NAME ?? 'ordu',
      namespace: process.env.POD_NAMESPACE ?? 'default',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })

export const fromPino = (logger: Logger): AppLoggerService => ({
  debug: (message, fields) => Effect.sync(() => logger.debug(fields ?? {}, message)),
  info: (message, fields) => Effect.sync(() => logger.info(fields ?? {}, message)),
  warn: (message, fields) => Effect.sync(() => logger.warn(fields ?? {}, message)),
  error: (message, fields) => Effect.sync(() => logger.error(fields ?? {}, message)),
})

/** Logs a rejected operation: internal failures at error, everything else at warn. */
export const logRejection = (
  logger: AppLoggerService,
  message: string,
  error: { readonly kind: string; readonly message: string },
  fields: LogFields = {},
) => {
  const log = error.kind === 'Internal' ? logger.error : logger.warn
  return log(message, { ...fields, kind: error.kind, error: error.message })
}

export const AppLoggerLayer = Layer.effect(
  AppLogger,
  Effect.map(AppConfigService, (config) => fromPino(createPinoLogger(config.logLevel))),
)

export const makeAppLoggerLayer = (logger: Logger) => Layer.succeed(AppLogger, fromPino(logger))

export const SilentLoggerLayer = makeAppLoggerLayer(pino({ level: 'silent' }))
