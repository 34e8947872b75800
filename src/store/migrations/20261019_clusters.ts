import { type Kysely, sql } from 'kysely'

import type { Database } from '../db'

export const up = async (db: Kysely<Database>) => {
  await sql`CREATE SCHEMA IF NOT EXISTS ordu`.execute(db)

  await sql`
    CREATE TABLE IF NOT EXISTS ${sql.ref('ordu.clusters')} (
      id UUID PRIMARY KEY,
      name TEXT NOT NULL,
      created_by TEXT NOT NULL,
      platform TEXT NOT NULL,
      phase TEXT NOT NULL,
      generation BIGINT NOT NULL DEFAULT 1 CHECK (generation >= 1),
      spec JSONB NOT NULL,
      status JSONB NOT NULL,
      reports JSONB NOT NULL DEFAULT '{}'::jsonb,
      deletion_requested_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `.execute(db)

  await sql`CREATE INDEX IF NOT EXISTS clusters_platform_idx ON ${sql.ref('ordu.clusters')} (platform)`.execute(db)
  await sql`CREATE INDEX IF NOT EXISTS clusters_phase_idx ON ${sql.ref('ordu.clusters')} (phase)`.execute(db)
  await sql`CREATE INDEX IF NOT EXISTS clusters_created_by_idx ON ${sql.ref('ordu.clusters')} (created_by)`.execute(db)
  await sql`
    CREATE INDEX IF NOT EXISTS clusters_created_at_id_idx ON ${sql.ref('ordu.clusters')} (created_at, id)
  `.execute(db)
}

export const down = async (db: Kysely<Database>) => {
  await sql`DROP TABLE IF EXISTS ${sql.ref('ordu.clusters')}`.execute(db)
}
