/**
 * Migration runner for the run history database.
 *
 * Applied versions are tracked in `schema_migrations`; pending migrations
 * run in version order, each in its own transaction.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { initialSchemaMigration } from './001-initial-schema.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  name: string
  /** Must be idempotent */
  up(db: BetterSqlite3Database): void
}

/** Registered migrations, in version order */
export const MIGRATIONS: readonly Migration[] = [initialSchemaMigration]

/** Apply pending migrations; safe to call repeatedly */
export function runMigrations(db: BetterSqlite3Database, migrations: readonly Migration[] = MIGRATIONS): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const applied = new Set<number>(
    (db.prepare('SELECT version FROM schema_migrations').all() as { version: number }[]).map((row) => row.version),
  )
  const pending = migrations.filter((m) => !applied.has(m.version)).sort((a, b) => a.version - b.version)
  if (pending.length === 0) return

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()
    logger.debug({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
