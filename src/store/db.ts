import { existsSync, readFileSync } from 'node:fs'

import { type ColumnType, Kysely, PostgresDialect } from 'kysely'
import { Pool } from 'pg'

import type { ClusterSpec, ClusterStatus, ControllerReport } from '@/clusters/types'

export type Db = Kysely<Database>

type Timestamp = ColumnType<Date | string, string, string>

type ClustersTable = {
  id: string
  name: string
  created_by: string
  platform: string
  phase: string
  // bigint columns come back from pg as strings
  generation: ColumnType<string | number, number, number>
  spec: ClusterSpec
  status: ClusterStatus
  reports: Record<string, ControllerReport>
  deletion_requested_at: ColumnType<Date | string | null, string | null, string | null>
  created_at: Timestamp
  updated_at: Timestamp
}

export type Database = {
  'ordu.clusters': ClustersTable
}

const DEFAULT_SSLMODE = 'require'

const loadCaCert = (rawValue: string) => {
  if (rawValue.includes('BEGIN CERTIFICATE')) {
    return rawValue
  }
  if (existsSync(rawValue)) {
    return readFileSync(rawValue, 'utf8')
  }
  return rawValue
}

const resolveSslMode = (rawUrl: string) => {
  try {
    const url = new URL(rawUrl)
    const mode = url.searchParams.get('sslmode')
    return mode ? mode.trim().toLowerCase() : null
  } catch {
    return null
  }
}

const resolveEffectiveSslMode = (rawUrl: string, env: NodeJS.ProcessEnv = process.env) => {
  const urlMode = resolveSslMode(rawUrl)
  if (urlMode) return urlMode

  const envMode = env.PGSSLMODE?.trim()
  if (envMode) return envMode.toLowerCase()

  return DEFAULT_SSLMODE
}

const resolveSslConfig = (sslmode: string | null, caCertPath?: string) => {
  if (sslmode === 'disable') return undefined

  const requiresVerification = sslmode === 'verify-ca' || sslmode === 'verify-full'
  if (requiresVerification) {
    const ca = caCertPath ? loadCaCert(caCertPath) : undefined
    return ca ? { ca, rejectUnauthorized: true } : { rejectUnauthorized: true }
  }

  if (!sslmode && !caCertPath) return undefined
  return { rejectUnauthorized: false }
}

export const createKyselyDb = (rawUrl: string): Db => {
  const url = rawUrl.trim()
  const sslmode = resolveEffectiveSslMode(url)
  const ssl = resolveSslConfig(sslmode, process.env.PGSSLROOTCERT?.trim())

  const pool = new Pool({ connectionString: url, ssl })
  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  })
}

export const __private = {
  resolveEffectiveSslMode,
  resolveSslConfig,
}
