import { type Migration, type MigrationProvider, Migrator } from 'kysely'

import type { Db } from '@/store/db'
import * as clustersMigration from '@/store/migrations/20261019_clusters'

type MigrationMap = Record<string, Migration>

export type MigrationsMode = 'auto' | 'skip'

class StaticMigrationProvider implements MigrationProvider {
  constructor(private readonly migrations: MigrationMap) {}

  async getMigrations(): Promise<MigrationMap> {
    return this.migrations
  }
}

const migrations: MigrationMap = {
  '20261019_clusters': clustersMigration,
}

const migrationProvider = new StaticMigrationProvider(migrations)
const migrationPromises = new WeakMap<Db, Promise<void>>()

const runMigrations = async (db: Db) => {
  const migrator = new Migrator({
    db,
    provider: migrationProvider,
  })

  const { error, results } = await migrator.migrateToLatest()

  if (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`failed to run database migrations: ${message}`)
  }

  const failed = results?.find((result) => result.status === 'Error')
  if (failed) {
    throw new Error(`migration ${failed.migrationName} failed`)
  }
}

/** Runs pending migrations once per database handle; a failed run is retried on the next call. */
export const ensureMigrations = async (db: Db, mode: MigrationsMode = 'auto') => {
  if (mode === 'skip') {
    return
  }
  let ready = migrationPromises.get(db)
  if (!ready) {
    ready = runMigrations(db)
    migrationPromises.set(db, ready)
  }

  try {
    await ready
  } catch (error) {
    migrationPromises.delete(db)
    throw error
  }
}
