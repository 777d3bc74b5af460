/**
 * Migration 001: run history.
 *
 *  - runs             one row per analysis run
 *  - run_tasks        final state of each role in a run
 *  - agent_results    succeeded role outputs
 *  - failure_records  every failed attempt or skip
 *  - reports          synthesized report, at most one per run
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id                TEXT PRIMARY KEY,
        status            TEXT NOT NULL,
        selected_roles    TEXT NOT NULL,
        started_at        TEXT NOT NULL,
        finished_at       TEXT NOT NULL,
        duration_ms       INTEGER NOT NULL,
        cancelled         INTEGER NOT NULL DEFAULT 0,
        aggregation_error TEXT,
        key_insights      TEXT NOT NULL DEFAULT '{}',
        created_at        TEXT NOT NULL DEFAULT (datetime('now'))
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

      CREATE TABLE IF NOT EXISTS run_tasks (
        run_id          TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        role            TEXT NOT NULL,
        state           TEXT NOT NULL,
        attempts        INTEGER NOT NULL DEFAULT 0,
        last_error_class TEXT,
        last_error      TEXT,
        position        INTEGER NOT NULL,
        PRIMARY KEY (run_id, role)
      );

      CREATE TABLE IF NOT EXISTS agent_results (
        run_id        TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        role          TEXT NOT NULL,
        content       TEXT NOT NULL,
        raw_text      TEXT NOT NULL,
        latency_ms    INTEGER,
        input_tokens  INTEGER,
        output_tokens INTEGER,
        attempts      INTEGER,
        created_at    TEXT NOT NULL,
        PRIMARY KEY (run_id, role)
      );

      CREATE TABLE IF NOT EXISTS failure_records (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id      TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        role        TEXT NOT NULL,
        attempt     INTEGER NOT NULL,
        error_class TEXT NOT NULL,
        message     TEXT NOT NULL,
        created_at  TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_failures_run ON failure_records(run_id);

      CREATE TABLE IF NOT EXISTS reports (
        run_id      TEXT PRIMARY KEY REFERENCES runs(id) ON DELETE CASCADE,
        role        TEXT NOT NULL,
        content     TEXT NOT NULL,
        unavailable TEXT NOT NULL DEFAULT '[]',
        created_at  TEXT NOT NULL
      );
    `)
  },
}
