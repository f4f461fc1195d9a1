/**
 * @fileoverview StockService tests
 *
 * Tests: src/services/stock.ts
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ReferentialError, ValidationError } from '@layerfarm/db'
import { ALL_TIME, failureOf, openTestFarm, type TestFarm } from './fixtures'

describe('stock.ts', () => {
  let farm: TestFarm

  beforeEach(async () => {
    farm = await openTestFarm()
  })

  afterEach(async () => {
    await farm.store.close()
  })

  describe('getEggStock', () => {
    it('should start at zero', async () => {
      const snapshot = await farm.services.stock.getEggStock()
      expect(snapshot.counts).toEqual({ c: 0, b: 0, a: 0, aa: 0, aaa: 0, jumbo: 0 })
      expect(snapshot.total).toBe(0)
    })
  })

  describe('adjustEggStock', () => {
    it('should negate loss quantities before applying and storing them', async () => {
      const { stock } = farm.services
      await stock.adjustEggStock({
        kind: 'loss',
        deltas: { c: 5 },
        reason: 'broken in transit',
        date: '2026-03-05',
        time: '09:00:00',
      })

      expect((await stock.getEggStock()).counts.c).toBe(-5)

      const [adjustment] = await stock.listAdjustments('2026-03-05', '2026-03-05')
      expect(adjustment.kind).toBe('loss')
      expect(adjustment.c).toBe(-5)
      expect(adjustment.b).toBe(0)
      expect(adjustment.reason).toBe('broken in transit')
    })

    it('should apply correction deltas with their own sign', async () => {
      const { production, stock } = farm.services
      await production.recordProduction({ date: '2026-03-01', time: '07:00:00', counts: { b: 10, a: 10 } })
      await stock.adjustEggStock({ kind: 'correction', deltas: { b: -2, a: 4 } })

      const { counts } = await stock.getEggStock()
      expect(counts.b).toBe(8)
      expect(counts.a).toBe(14)
    })

    it('should reject a negative loss quantity', async () => {
      const error = await failureOf(
        farm.services.stock.adjustEggStock({ kind: 'loss', deltas: { c: -3 } }),
        ValidationError,
      )
      expect(error.field).toBe('deltas.c')
    })

    it('should reject an adjustment with every delta at zero', async () => {
      const error = await failureOf(
        farm.services.stock.adjustEggStock({ kind: 'correction', deltas: { c: 0 } }),
        ValidationError,
      )
      expect(error.field).toBe('deltas')
    })
  })

  describe('supply stock', () => {
    async function buyFeed() {
      return farm.services.purchases.registerSupplyPurchase({
        name: 'Feed',
        category: 'feed',
        unit: 'kg',
        quantity: 100,
        unitCost: 5,
        totalCost: 500,
        purchaseDate: '2026-03-01',
      })
    }

    it('should list items with their alert flag', async () => {
      const { supplyStockId } = await buyFeed()
      const { stock } = farm.services

      const [item] = await stock.listSupplyStock()
      expect(item.id).toBe(supplyStockId)
      expect(item.name).toBe('Feed')
      expect(item.currentQuantity).toBe(100)
      expect(item.minimumQuantity).toBe(0)
      expect(item.alert).toBe(false)
      expect(await stock.listStockAlerts()).toEqual([])
    })

    it('should raise an alert once the quantity is at or below the minimum', async () => {
      const { supplyStockId } = await buyFeed()
      const { stock } = farm.services

      const updated = await stock.setMinimumQuantity(supplyStockId, { minimum: 100 })
      expect(updated.alert).toBe(true)

      const alerts = await stock.listStockAlerts()
      expect(alerts.map((item) => item.id)).toEqual([supplyStockId])
    })

    it('should lower the quantity on usage and raise it on intake', async () => {
      const { supplyStockId } = await buyFeed()
      const { stock } = farm.services

      await stock.recordSupplyUsage({ supplyStockId, quantity: 30, reason: 'morning ration', date: '2026-03-02', time: '06:00:00' })
      await stock.recordSupplyIntake({ supplyStockId, quantity: 10, reason: 'returned sack', date: '2026-03-03', time: '06:00:00' })

      expect((await stock.getSupplyStock(supplyStockId)).currentQuantity).toBe(80)

      const movements = await stock.listSupplyMovements('2026-03-01', '2026-03-31')
      expect(movements.map((movement) => [movement.kind, movement.quantity, movement.name])).toEqual([
        ['in', 10, 'Feed'],
        ['out', 30, 'Feed'],
      ])
    })

    it('should allow usage to take the quantity below zero', async () => {
      const { supplyStockId } = await buyFeed()
      await farm.services.stock.recordSupplyUsage({ supplyStockId, quantity: 120 })

      expect((await farm.services.stock.getSupplyStock(supplyStockId)).currentQuantity).toBe(-20)
    })

    it('should record a count correction as a movement', async () => {
      const { supplyStockId } = await buyFeed()
      const { stock } = farm.services

      const change = await stock.setSupplyQuantity(supplyStockId, { quantity: 64 })
      expect(change.currentQuantity).toBe(64)
      expect(change.movementId).not.toBeNull()

      const movements = await stock.listSupplyMovements(ALL_TIME.from, ALL_TIME.to)
      expect(movements).toHaveLength(1)
      expect(movements[0].kind).toBe('out')
      expect(movements[0].quantity).toBe(36)
      expect(movements[0].reason).toBe('Stock count correction')
    })

    it('should not record a movement when the count already matches', async () => {
      const { supplyStockId } = await buyFeed()
      const change = await farm.services.stock.setSupplyQuantity(supplyStockId, { quantity: 100 })

      expect(change).toEqual({ supplyStockId, currentQuantity: 100, movementId: null })
    })

    it('should reject an unknown supply item', async () => {
      const error = await failureOf(
        farm.services.stock.recordSupplyUsage({ supplyStockId: 'supply_stock_missing', quantity: 1 }),
        ReferentialError,
      )
      expect(error.code).toBe('NOT_FOUND')
      expect(error.context).toEqual({ entity: 'Supply item', id: 'supply_stock_missing' })
    })

    it('should reject a non-positive movement quantity', async () => {
      const { supplyStockId } = await buyFeed()
      const error = await failureOf(
        farm.services.stock.recordSupplyUsage({ supplyStockId, quantity: 0 }),
        ValidationError,
      )
      expect(error.field).toBe('quantity')
    })
  })
})
