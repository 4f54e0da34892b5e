/**
 * Alert Log Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { AlertLog } from '../../../src/alerts'
import { MemoryHistoryStore } from '../../../src/history'
import { setLogger } from '../../../src/utils/logger'
import { makeAlert } from '../../helpers/fixtures'

describe('AlertLog', () => {
  let store: MemoryHistoryStore
  let log: AlertLog

  beforeEach(() => {
    store = new MemoryHistoryStore()
    log = new AlertLog(store)
  })

  describe('emit', () => {
    it('should store the alert and return it with its id', () => {
      const alert = makeAlert()

      const emitted = log.emit(alert)

      expect(emitted).toEqual({ ...alert, id: 1 })
      expect(store.listAlerts({ limit: 10 })).toEqual([emitted])
    })

    it('should log regressions as warnings and improvements as info', () => {
      const spy = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      setLogger(spy)

      log.emit(makeAlert({ severity: 'critical', message: 'jackson latency increased by 30.0%' }))
      log.emit(makeAlert({ alertType: 'improvement', severity: 'info', message: 'jackson latency improved by 20.0%' }))

      expect(spy.warn).toHaveBeenCalledWith('[critical] jackson latency increased by 30.0%')
      expect(spy.info).toHaveBeenCalledWith('[info] jackson latency improved by 20.0%')
    })
  })

  describe('list', () => {
    it('should return alerts newest first', () => {
      log.emit(makeAlert({ timestamp: '2024-06-01T00:00:00.000Z', message: 'first' }))
      log.emit(makeAlert({ timestamp: '2024-06-03T00:00:00.000Z', message: 'third' }))
      log.emit(makeAlert({ timestamp: '2024-06-02T00:00:00.000Z', message: 'second' }))

      expect(log.list().map(a => a.message)).toEqual(['third', 'second', 'first'])
    })

    it('should filter by severity and framework', () => {
      log.emit(makeAlert({ framework: 'jackson', severity: 'critical' }))
      log.emit(makeAlert({ framework: 'jackson', severity: 'warning' }))
      log.emit(makeAlert({ framework: 'avro', severity: 'critical' }))

      expect(log.list({ severity: 'critical' }).map(a => a.framework)).toEqual(['avro', 'jackson'])
      expect(log.list({ framework: 'jackson' }).map(a => a.severity)).toEqual(['warning', 'critical'])
    })

    it('should filter by time', () => {
      log.emit(makeAlert({ timestamp: '2024-05-01T00:00:00.000Z', message: 'old' }))
      log.emit(makeAlert({ timestamp: '2024-06-01T00:00:00.000Z', message: 'new' }))

      expect(log.list({ since: new Date('2024-06-01T00:00:00.000Z') }).map(a => a.message)).toEqual(['new'])
    })

    it('should default to 20 alerts', () => {
      for (let i = 0; i < 25; i++) {
        log.emit(makeAlert())
      }

      expect(log.list()).toHaveLength(20)
      expect(log.list({ limit: 3 })).toHaveLength(3)
    })
  })
})
