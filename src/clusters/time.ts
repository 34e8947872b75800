import { Clock, Effect } from 'effect'

export const currentIsoTime = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis).toISOString())
