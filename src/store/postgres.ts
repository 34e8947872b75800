import { type Selectable, sql } from 'kysely'

import type { ClusterRecord } from '@/clusters/types'
import { createKyselyDb, type Database, type Db } from '@/store/db'
import { ensureMigrations, type MigrationsMode } from '@/store/migrations'
import type { ClusterStore } from '@/store/types'

const TABLE = 'ordu.clusters'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

type ClusterRow = Selectable<Database[typeof TABLE]>

type PostgresClusterStoreOptions = {
  url?: string
  createDb?: (url: string) => Db
  migrations?: MigrationsMode
  /** Per-transaction statement and lock deadline; expiry rolls the write back. */
  statementTimeoutMs?: number
}

const jsonb = <T>(value: T) => sql<T>`${JSON.stringify(value)}::jsonb`

const toIso = (value: Date | string) => (value instanceof Date ? value : new Date(value)).toISOString()

const toClusterRecord = (row: ClusterRow): ClusterRecord => ({
  id: row.id,
  name: row.name,
  spec: row.spec,
  generation: Number(row.generation),
  createdBy: row.created_by,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  deletionRequestedAt: row.deletion_requested_at === null ? null : toIso(row.deletion_requested_at),
  status: row.status,
  reports: row.reports,
})

const toMutableColumns = (record: ClusterRecord) => ({
  name: record.name,
  platform: record.spec.platform.type,
  phase: record.status.phase,
  generation: record.generation,
  spec: jsonb(record.spec),
  status: jsonb(record.status),
  reports: jsonb(record.reports),
  deletion_requested_at: record.deletionRequestedAt,
  updated_at: record.updatedAt,
})

export const createPostgresClusterStore = (options: PostgresClusterStoreOptions = {}): ClusterStore => {
  const url = options.url ?? process.env.DATABASE_URL
  if (!url) {
    throw new Error('DATABASE_URL is required for Postgres cluster storage')
  }

  const db = (options.createDb ?? createKyselyDb)(url)
  const ready = () => ensureMigrations(db, options.migrations)
  const { statementTimeoutMs } = options

  const insert: ClusterStore['insert'] = async (record) => {
    await ready()
    await db
      .insertInto(TABLE)
      .values({
        id: record.id,
        created_by: record.createdBy,
        created_at: record.createdAt,
        ...toMutableColumns(record),
      })
      .execute()
  }

  // Ids that cannot be a uuid would fail the column cast; they simply do not exist.
  const get: ClusterStore['get'] = async (id) => {
    if (!UUID_PATTERN.test(id)) return null
    await ready()
    const row = await db.selectFrom(TABLE).selectAll().where('id', '=', id).executeTakeFirst()
    return row ? toClusterRecord(row) : null
  }

  const mutate: ClusterStore['mutate'] = async (id, apply) => {
    if (!UUID_PATTERN.test(id)) return null
    await ready()
    return db.transaction().execute(async (trx) => {
      if (statementTimeoutMs !== undefined) {
        const timeout = String(statementTimeoutMs)
        await sql`select set_config('statement_timeout', ${timeout}, true)`.execute(trx)
        await sql`select set_config('lock_timeout', ${timeout}, true)`.execute(trx)
      }
      const row = await trx.selectFrom(TABLE).selectAll().where('id', '=', id).forUpdate().executeTakeFirst()
      if (!row) return null

      const mutation = apply(toClusterRecord(row))
      if (mutation.type === 'remove') {
        await trx.deleteFrom(TABLE).where('id', '=', id).execute()
      } else {
        await trx.updateTable(TABLE).set(toMutableColumns(mutation.record)).where('id', '=', id).execute()
      }
      return mutation
    })
  }

  const list: ClusterStore['list'] = async ({ platform, phase, createdBy, limit, offset }) => {
    await ready()
    let query = db.selectFrom(TABLE)
    if (platform) query = query.where('platform', '=', platform)
    if (phase) query = query.where('phase', '=', phase)
    if (createdBy) query = query.where('created_by', '=', createdBy)

    const counted = await query.select((eb) => eb.fn.countAll<string | number>().as('total')).executeTakeFirst()
    const rows = await query
      .selectAll()
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc')
      .limit(limit)
      .offset(offset)
      .execute()

    return { records: rows.map(toClusterRecord), total: Number(counted?.total ?? 0) }
  }

  const ping: ClusterStore['ping'] = async () => {
    await sql`SELECT 1`.execute(db)
  }

  const close = async () => {
    await db.destroy()
  }

  return { kind: 'postgres', insert, get, mutate, list, ping, close }
}
