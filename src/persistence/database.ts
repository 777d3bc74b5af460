/**
 * Run history database — better-sqlite3 with WAL journaling and the
 * versioned migrations in ./migrations.
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  get path(): string {
    return this._path
  }

  /**
   * Open the database, apply PRAGMAs and pending migrations.
   * A no-op when already open.
   */
  open(): void {
    if (this._db !== null) return

    if (this._path !== IN_MEMORY) {
      mkdirSync(dirname(this._path), { recursive: true })
    }
    const db = new BetterSqlite3(this._path)

    const journal: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journal !== 'wal') {
      logger.debug({ journal }, 'WAL journaling unavailable for this database')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')

    runMigrations(db)
    this._db = db
    logger.debug({ path: this._path }, 'Database opened')
  }

  /** A no-op when already closed */
  close(): void {
    if (this._db === null) return
    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'Database closed')
  }

  /** @throws {Error} before open() */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

/** Open (creating if needed) and migrate the database at `path` */
export function openDatabase(path: string): DatabaseWrapper {
  const wrapper = new DatabaseWrapper(path)
  wrapper.open()
  return wrapper
}
