/**
 * SqliteHistoryStore Tests
 *
 * Contract suite against `:memory:`, plus file-backed behavior in a temp dir.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import { ErrorCode, StoreUnavailableError } from '../../../src/errors'
import { SqliteHistoryStore } from '../../../src/history/sqlite-store'
import { createHistoryStoreTests } from '../../helpers/history-store-contract'
import { makeAlert, makeRecord, makeRun } from '../../helpers/fixtures'
import { createTempDir, type TempDir } from '../../helpers/temp-dir'

createHistoryStoreTests('SqliteHistoryStore', options => new SqliteHistoryStore(':memory:', options))

describe('SqliteHistoryStore (file-backed)', () => {
  let ctx: TempDir

  beforeEach(async () => {
    ctx = await createTempDir()
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  it('should persist runs, records and alerts across reopen', () => {
    const path = ctx.file('history.db')

    const first = new SqliteHistoryStore(path)
    const runId = first.recordRun(makeRun(), [makeRecord('jackson', 'integration', { latency_ms: 10, p99_ms: 30 })])
    first.insertAlert(makeAlert({ runId }))
    first.close()

    const second = new SqliteHistoryStore(path)
    try {
      expect(second.getRun(runId)?.runKind).toBe('integration')
      expect(second.getMetric(runId, 'jackson', 'integration')?.metrics).toMatchObject({
        latency_ms: 10,
        p99_ms: 30,
        throughput_ops_per_sec: null,
      })
      expect(second.listAlerts({ limit: 10 })).toHaveLength(1)
      expect(second.insertRun(makeRun())).toBe(runId + 1)
    } finally {
      second.close()
    }
  })

  it('should store unmeasured metrics as SQL NULL', () => {
    const path = ctx.file('nulls.db')
    const store = new SqliteHistoryStore(path)
    store.recordRun(makeRun(), [makeRecord('avro', 'integration', { latency_ms: 0 })])
    store.close()

    const db = new Database(path)
    try {
      const row = db
        .prepare<[], { latency_ms: number | null; throughput_ops_per_sec: number | null }>(
          'SELECT latency_ms, throughput_ops_per_sec FROM framework_results'
        )
        .get()
      expect(row).toEqual({ latency_ms: 0, throughput_ops_per_sec: null })
    } finally {
      db.close()
    }
  })

  it('should open the database in WAL mode', () => {
    const store = new SqliteHistoryStore(ctx.file('wal.db'))
    store.close()

    const db = new Database(ctx.file('wal.db'))
    try {
      expect(db.pragma('journal_mode', { simple: true })).toBe('wal')
    } finally {
      db.close()
    }
  })

  it('should report the database path as its location', () => {
    const path = ctx.file('stats.db')
    const store = new SqliteHistoryStore(path)
    try {
      expect(store.stats().location).toBe(path)
    } finally {
      store.close()
    }
  })

  it('should throw StoreUnavailableError when the file cannot be opened', () => {
    const path = ctx.file('missing-dir/history.db')

    let caught: unknown
    try {
      new SqliteHistoryStore(path)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(StoreUnavailableError)
    expect(caught).toMatchObject({
      code: ErrorCode.STORAGE_UNAVAILABLE,
      context: { operation: 'open', location: path },
    })
  })
})
