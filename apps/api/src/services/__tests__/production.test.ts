/**
 * @fileoverview ProductionService tests
 *
 * Tests: src/services/production.ts
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConsistencyViolation, ValidationError, eggStock } from '@layerfarm/db'
import { failureOf, openTestFarm, type TestFarm } from './fixtures'

describe('production.ts', () => {
  let farm: TestFarm

  beforeEach(async () => {
    farm = await openTestFarm()
  })

  afterEach(async () => {
    await farm.store.close()
  })

  describe('recordProduction', () => {
    it('should add the counts to the egg stock', async () => {
      const { production, stock } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 10, a: 5 } })

      const snapshot = await stock.getEggStock()
      expect(snapshot.counts).toEqual({ c: 10, b: 0, a: 5, aa: 0, aaa: 0, jumbo: 0 })
      expect(snapshot.total).toBe(15)
      expect(snapshot.date).toBe('2026-03-01')
      expect(snapshot.time).toBe('07:30:00')
    })

    it('should keep the stock equal to the sum of all records', async () => {
      const { production, stock } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 10, a: 5 } })
      await production.recordProduction({ date: '2026-03-02', time: '16:00:00', counts: { b: 3, a: 2, jumbo: 1 } })

      const snapshot = await stock.getEggStock()
      expect(snapshot.counts).toEqual({ c: 10, b: 3, a: 7, aa: 0, aaa: 0, jumbo: 1 })
      expect(snapshot.date).toBe('2026-03-02')
      expect(snapshot.time).toBe('16:00:00')
    })

    it('should reject a record with every count at zero', async () => {
      const error = await failureOf(
        farm.services.production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: {} }),
        ValidationError,
      )
      expect(error.field).toBe('counts')
      expect(error.code).toBe('VALIDATION_ERROR')
    })

    it('should name the offending category for a negative count', async () => {
      const error = await failureOf(
        farm.services.production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: -1 } }),
        ValidationError,
      )
      expect(error.field).toBe('counts.c')
    })

    it('should reject a date that is not on the calendar', async () => {
      const error = await failureOf(
        farm.services.production.recordProduction({ date: '2026-02-30', time: '07:30:00', counts: { c: 1 } }),
        ValidationError,
      )
      expect(error.field).toBe('date')
    })

    it('should reject a count beyond the 32-bit column range', async () => {
      const { production, stock } = farm.services
      const error = await failureOf(
        production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 3_000_000_000 } }),
        ValidationError,
      )

      expect(error.field).toBe('counts.c')
      expect((await stock.getEggStock()).total).toBe(0)
    })

    it('should leave the stock untouched when validation fails', async () => {
      const { production, stock } = farm.services
      await failureOf(production.recordProduction({ date: '2026-03-01', time: '7am', counts: { c: 4 } }), ValidationError)

      expect((await stock.getEggStock()).total).toBe(0)
      expect(await production.listByRange('2026-03-01', '2026-03-01')).toEqual([])
    })
  })

  describe('derived state', () => {
    it('should roll back the record when the egg stock row is missing', async () => {
      const { production } = farm.services
      await farm.store.db.delete(eggStock)

      const error = await failureOf(
        production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 4 } }),
        ConsistencyViolation,
      )
      expect(error.code).toBe('CONSISTENCY_VIOLATION')
      expect(error.context).toEqual({ rule: 'production' })
      expect(await production.listByRange('2026-03-01', '2026-03-01')).toEqual([])
    })
  })

  describe('listByRange', () => {
    it('should return records newest first', async () => {
      const { production } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 1 } })
      await production.recordProduction({ date: '2026-03-02', time: '07:30:00', counts: { c: 2 } })
      await production.recordProduction({ date: '2026-03-02', time: '17:00:00', counts: { c: 3 } })

      const records = await production.listByRange('2026-03-01', '2026-03-02')
      expect(records.map((record) => record.c)).toEqual([3, 2, 1])
    })

    it('should reject a range whose start is after its end', async () => {
      const error = await failureOf(farm.services.production.listByRange('2026-03-05', '2026-03-01'), ValidationError)
      expect(error.field).toBe('to')
    })
  })

  describe('listForDay', () => {
    it('should only return the records of that day', async () => {
      const { production } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 1 } })
      await production.recordProduction({ date: '2026-03-02', time: '07:30:00', counts: { c: 2 } })

      const records = await production.listForDay('2026-03-02')
      expect(records).toHaveLength(1)
      expect(records[0].c).toBe(2)
    })
  })

  describe('totalsForRange', () => {
    it('should sum each category over the range', async () => {
      const { production } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:30:00', counts: { c: 10, a: 5 } })
      await production.recordProduction({ date: '2026-03-01', time: '16:30:00', counts: { c: 2 } })
      await production.recordProduction({ date: '2026-03-04', time: '07:30:00', counts: { aa: 8 } })

      const totals = await production.totalsForRange('2026-03-01', '2026-03-03')
      expect(totals).toEqual({
        counts: { c: 12, b: 0, a: 5, aa: 0, aaa: 0, jumbo: 0 },
        total: 17,
        records: 2,
      })
    })

    it('should return zeros for an empty range', async () => {
      const totals = await farm.services.production.totalsForRange('2026-01-01', '2026-01-31')
      expect(totals).toEqual({
        counts: { c: 0, b: 0, a: 0, aa: 0, aaa: 0, jumbo: 0 },
        total: 0,
        records: 0,
      })
    })
  })
})
