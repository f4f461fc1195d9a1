/**
 * @fileoverview ReportService tests
 *
 * Tests: src/services/reports.ts
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { previousPeriod } from '../reports'
import { openTestFarm, type TestFarm } from './fixtures'

/**
 * March 2026:
 * - 100 eggs collected (60 C, 40 A)
 * - two orders placed on 03-02, dispatched 03-03 (2 C baskets, 12) and 03-04 (1 A basket, 9)
 * - feed 300 and vitamins 50 bought, one 200 wage paid
 * - a +45 AA stock correction
 */
async function seedMarch(farm: TestFarm) {
  const { clients, workers, production, orders, purchases, payments, stock } = farm.services
  const ana = await clients.createClient({ name: 'Ana Torres' })
  const beto = await clients.createClient({ name: 'Beto Ruiz' })
  const luis = await workers.createWorker({ name: 'Luis Pardo' })

  await production.recordProduction({ date: '2026-03-01', time: '07:00:00', counts: { c: 60, a: 40 } })

  const first = await orders.createOrder({ clientId: ana, date: '2026-03-02', time: '09:00:00', baskets: { c: 2 }, totalPrice: 12 })
  const second = await orders.createOrder({ clientId: beto, date: '2026-03-02', time: '10:00:00', baskets: { a: 1 }, totalPrice: 9 })
  await orders.dispatchOrder(first, { date: '2026-03-03', time: '08:00:00', baskets: { c: 2 } })
  await orders.dispatchOrder(second, { date: '2026-03-04', time: '08:00:00', baskets: { a: 1 } })

  await purchases.registerSupplyPurchase({
    name: 'Feed',
    category: 'feed',
    unit: 'kg',
    quantity: 60,
    unitCost: 5,
    totalCost: 300,
    purchaseDate: '2026-03-01',
  })
  await purchases.registerSupplyPurchase({
    name: 'Vitamins',
    category: 'medicine',
    unit: 'litres',
    quantity: 2,
    unitCost: 25,
    totalCost: 50,
    purchaseDate: '2026-03-02',
  })
  await payments.registerWorkerPayment({ workerId: luis, date: '2026-03-07', time: '18:00:00', amount: 200 })

  await stock.adjustEggStock({ kind: 'correction', deltas: { aa: 45 }, date: '2026-03-08', time: '12:00:00' })
  return { ana, beto }
}

describe('reports.ts', () => {
  let farm: TestFarm

  beforeEach(async () => {
    farm = await openTestFarm()
  })

  afterEach(async () => {
    await farm.store.close()
  })

  describe('empty period', () => {
    it('should return zeros instead of failing', async () => {
      const { reports } = farm.services

      expect(await reports.balance('2025-01-01', '2025-01-31')).toEqual({ totalIncome: 0, totalExpense: 0, balance: 0 })
      expect(await reports.movementsByCategory('2025-01-01', '2025-01-31')).toEqual([])
      expect(await reports.productionVsSales('2025-01-01', '2025-01-31')).toEqual({ totalProduced: 0, totalSold: 0 })
      expect(await reports.costPerEgg('2025-01-01', '2025-01-31')).toEqual({ totalCost: 0, eggsProduced: 0, costPerEgg: 0 })
      expect(await reports.dailySales('2025-01-01', '2025-01-31')).toEqual([])

      const summary = await reports.dashboardSummary('2025-01-01', '2025-01-31')
      expect(summary.current).toEqual({
        income: 0,
        expense: 0,
        balance: 0,
        marginPct: 0,
        produced: 0,
        sold: 0,
        sellThroughPct: 0,
      })
      expect(summary.previous).toBeUndefined()
    })
  })

  describe('with a month of activity', () => {
    beforeEach(async () => {
      await seedMarch(farm)
    })

    it('should compute the balance from financial movements', async () => {
      expect(await farm.services.reports.balance('2026-03-01', '2026-03-31')).toEqual({
        totalIncome: 21,
        totalExpense: 550,
        balance: -529,
      })
    })

    it('should group movements by type and category', async () => {
      expect(await farm.services.reports.movementsByCategory('2026-03-01', '2026-03-31')).toEqual([
        { type: 'income', category: 'egg sales', total: 21, movements: 2 },
        { type: 'expense', category: 'feed', total: 300, movements: 1 },
        { type: 'expense', category: 'worker payment', total: 200, movements: 1 },
        { type: 'expense', category: 'medicine', total: 50, movements: 1 },
      ])
    })

    it('should compare eggs produced with eggs sold', async () => {
      expect(await farm.services.reports.productionVsSales('2026-03-01', '2026-03-31')).toEqual({
        totalProduced: 100,
        totalSold: 90,
      })
    })

    it('should count only feed and wages in the cost per egg', async () => {
      expect(await farm.services.reports.costPerEgg('2026-03-01', '2026-03-31')).toEqual({
        totalCost: 500,
        eggsProduced: 100,
        costPerEgg: 5,
      })
    })

    it('should aggregate production and sales per day', async () => {
      const { reports } = farm.services
      expect(await reports.dailyProduction('2026-03-01', '2026-03-31')).toEqual([
        { date: '2026-03-01', total: 100, records: 1 },
      ])
      expect(await reports.dailySales('2026-03-01', '2026-03-31')).toEqual([
        { date: '2026-03-03', baskets: 2, eggs: 60, revenue: 12, orders: 1 },
        { date: '2026-03-04', baskets: 1, eggs: 30, revenue: 9, orders: 1 },
      ])
    })

    it('should rank clients by revenue', async () => {
      const { reports } = farm.services
      const ranking = await reports.topClients('2026-03-01', '2026-03-31')
      expect(ranking.map((client) => [client.name, client.orders, client.baskets, client.revenue])).toEqual([
        ['Ana Torres', 1, 2, 12],
        ['Beto Ruiz', 1, 1, 9],
      ])
      expect(await reports.topClients('2026-03-01', '2026-03-31', 1)).toHaveLength(1)
    })

    it('should break sales down by egg category', async () => {
      const sales = await farm.services.reports.salesByCategory('2026-03-01', '2026-03-31')
      expect(sales.map((line) => [line.label, line.baskets, line.eggs])).toEqual([
        ['C', 2, 60],
        ['B', 0, 0],
        ['A', 1, 30],
        ['AA', 0, 0],
        ['AAA', 0, 0],
        ['Jumbo', 0, 0],
      ])
    })

    it('should summarise the egg stock', async () => {
      const statistics = await farm.services.reports.stockStatistics()
      expect(statistics.totalEggs).toBe(55)
      expect(statistics.totalBaskets).toBe(1)
      expect(statistics.categories.find((line) => line.category === 'a')).toEqual({
        category: 'a',
        label: 'A',
        eggs: 10,
        baskets: 0,
      })
      expect(statistics.categories.find((line) => line.category === 'aa')?.baskets).toBe(1)
    })

    it('should compute dashboard KPIs and compare with the previous period', async () => {
      const summary = await farm.services.reports.dashboardSummary('2026-03-01', '2026-03-31', { compare: true })

      expect(summary.current.income).toBe(21)
      expect(summary.current.expense).toBe(550)
      expect(summary.current.marginPct).toBeCloseTo((-529 / 21) * 100)
      expect(summary.current.sellThroughPct).toBe(90)
      expect(summary.previous?.period).toEqual({ from: '2026-01-29', to: '2026-02-28' })
      expect(summary.deltas?.income).toBeNull()
    })

    it('should report percentage changes against a non-empty previous period', async () => {
      const summary = await farm.services.reports.dashboardSummary('2026-03-04', '2026-03-04', { compare: true })

      expect(summary.previous?.period).toEqual({ from: '2026-03-03', to: '2026-03-03' })
      expect(summary.previous?.kpis.income).toBe(12)
      expect(summary.current.income).toBe(9)
      expect(summary.deltas?.income).toBe(-25)
      expect(summary.deltas?.expense).toBeNull()
    })
  })

  describe('previousPeriod', () => {
    it('should return the equally long period just before', () => {
      expect(previousPeriod({ from: '2026-03-01', to: '2026-03-10' })).toEqual({ from: '2026-02-19', to: '2026-02-28' })
    })
  })
})
