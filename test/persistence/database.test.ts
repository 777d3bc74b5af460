/**
 * Tests for DatabaseWrapper.
 *
 * Uses :memory: databases except where the on-disk path matters.
 * Validates:
 *  - open/close lifecycle
 *  - PRAGMA application (busy_timeout, synchronous, foreign_keys)
 *  - migrations applied on open
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { DatabaseWrapper, IN_MEMORY, openDatabase } from '../../src/persistence/database.js'

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(IN_MEMORY)
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('should start in a closed state', () => {
    expect(wrapper.isOpen).toBe(false)
    expect(wrapper.path).toBe(':memory:')
  })

  it('should open successfully', () => {
    wrapper.open()
    expect(wrapper.isOpen).toBe(true)
  })

  it('should throw when accessing db before open', () => {
    expect(() => wrapper.db).toThrow('DatabaseWrapper: database is not open. Call open() first.')
  })

  it('should be idempotent on repeated open calls', () => {
    wrapper.open()
    const db1 = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(db1)
  })

  it('should be idempotent on repeated close calls', () => {
    wrapper.open()
    wrapper.close()
    expect(() => wrapper.close()).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  it('should apply migrations on open', () => {
    wrapper.open()
    const row = wrapper.db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='runs'").get() as
      | { name: string }
      | undefined
    expect(row?.name).toBe('runs')
  })

  describe('PRAGMA verification', () => {
    it('should set busy_timeout to 5000', () => {
      wrapper.open()
      const result = wrapper.db.pragma('busy_timeout') as Array<{ timeout: number }>
      expect(result[0].timeout).toBe(5000)
    })

    it('should set synchronous to NORMAL (1)', () => {
      wrapper.open()
      const row = wrapper.db.pragma('synchronous') as Array<{ synchronous: number }>
      expect(row[0].synchronous).toBe(1)
    })

    it('should enable foreign keys', () => {
      wrapper.open()
      const row = wrapper.db.pragma('foreign_keys') as Array<{ foreign_keys: number }>
      expect(row[0].foreign_keys).toBe(1)
    })
  })
})

describe('openDatabase', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'run-history-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates missing parent directories and opens in WAL mode', () => {
    const path = join(dir, 'nested', 'state', 'runs.db')
    const database = openDatabase(path)
    try {
      expect(existsSync(path)).toBe(true)
      expect(database.db.pragma('journal_mode', { simple: true })).toBe('wal')
    } finally {
      database.close()
    }
  })
})
