import { DEFAULT_CONTROLLER_IDENTITIES } from '@/clusters/access'

export type StoreKind = 'memory' | 'postgres'

export type DeletionMode = 'hard' | 'graceful'

export interface AppConfig {
  port: number
  logLevel: string
  store: {
    kind: StoreKind
    databaseUrl: string | null
    timeoutMs: number
    migrations: 'auto' | 'skip'
  }
  list: {
    defaultLimit: number
    maxLimit: number
  }
  deletion: {
    mode: DeletionMode
  }
  access: {
    controllerIdentities: readonly string[]
  }
}

const DEFAULT_PORT = 8080
const DEFAULT_STORE_TIMEOUT_MS = 5000
const DEFAULT_LIST_LIMIT = 50
const DEFAULT_LIST_MAX_LIMIT = 1000

const parsePositiveInt = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name]?.trim()
  if (!raw) {
    return fallback
  }
  const value = Number.parseInt(raw, 10)
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw) {
    throw new Error(`${name} must be a positive integer, received "${raw}"`)
  }
  return value
}

const resolveStoreKind = (env: NodeJS.ProcessEnv, databaseUrl: string | null): StoreKind => {
  const raw = (env.ORDU_STORE ?? 'auto').trim().toLowerCase()
  switch (raw) {
    case 'auto':
    case '':
      return databaseUrl ? 'postgres' : 'memory'
    case 'memory':
      return 'memory'
    case 'postgres':
      if (!databaseUrl) {
        throw new Error('ORDU_STORE=postgres requires DATABASE_URL')
      }
      return 'postgres'
    default:
      throw new Error(`ORDU_STORE must be one of auto, memory, postgres, received "${raw}"`)
  }
}

const resolveDeletionMode = (env: NodeJS.ProcessEnv): DeletionMode => {
  const raw = (env.ORDU_DELETION_MODE ?? 'hard').trim().toLowerCase()
  if (raw === 'hard' || raw === 'graceful') {
    return raw
  }
  throw new Error(`ORDU_DELETION_MODE must be hard or graceful, received "${raw}"`)
}

const parseList = (raw: string | undefined, fallback: readonly string[]): readonly string[] => {
  const values = (raw ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
  return values.length > 0 ? values : fallback
}

const resolveMigrationsMode = (env: NodeJS.ProcessEnv): 'auto' | 'skip' => {
  const raw = env.ORDU_MIGRATIONS?.trim().toLowerCase()
  if (!raw) return 'auto'
  if (['skip', 'disabled', 'false', '0', 'off'].includes(raw)) return 'skip'
  return 'auto'
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const databaseUrl = env.DATABASE_URL?.trim() || null
  const defaultLimit = parsePositiveInt(env, 'ORDU_LIST_DEFAULT_LIMIT', DEFAULT_LIST_LIMIT)
  const maxLimit = parsePositiveInt(env, 'ORDU_LIST_MAX_LIMIT', DEFAULT_LIST_MAX_LIMIT)
  if (defaultLimit > maxLimit) {
    throw new Error('ORDU_LIST_DEFAULT_LIMIT must not exceed ORDU_LIST_MAX_LIMIT')
  }

  return {
    port: parsePositiveInt(env, 'PORT', DEFAULT_PORT),
    logLevel: (env.LOG_LEVEL ?? 'info').trim().toLowerCase() || 'info',
    store: {
      kind: resolveStoreKind(env, databaseUrl),
      databaseUrl,
      timeoutMs: parsePositiveInt(env, 'ORDU_STORE_TIMEOUT_MS', DEFAULT_STORE_TIMEOUT_MS),
      migrations: resolveMigrationsMode(env),
    },
    list: {
      defaultLimit,
      maxLimit,
    },
    deletion: {
      mode: resolveDeletionMode(env),
    },
    access: {
      controllerIdentities: parseList(env.ORDU_CONTROLLER_IDENTITIES, DEFAULT_CONTROLLER_IDENTITIES),
    },
  }
}
