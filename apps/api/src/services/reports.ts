/**
 * Read-only reporting over the ledgers.
 *
 * Balances come only from `financial_movements`. Nothing here throws for an
 * empty period: sums are zero and lists are empty.
 */

import { and, asc, desc, eq, gte, inArray, lte, sql } from 'drizzle-orm'
import { clients, dispatches, financialMovements, orders, productionRecords, type FarmStore } from '@layerfarm/db'
import {
  EGG_CATEGORIES,
  EGG_CATEGORY_LABELS,
  EGGS_PER_BASKET,
  sumCounts,
  type DateRange,
  type EggCategory,
  type MovementType,
} from '@layerfarm/schema'
import { WORKER_PAYMENT_CATEGORY } from './derived-state.js'
import { categorySums, countRows, pickCounts, rowTotal, sumOf } from './_sql.js'
import { StockService } from './stock.js'
import { parseRange } from './validation.js'

/** Expense categories counted as the cost of producing eggs. */
export const EGG_COST_CATEGORIES = ['feed', WORKER_PAYMENT_CATEGORY]

export type Balance = {
  totalIncome: number
  totalExpense: number
  balance: number
}

export type CategoryMovement = {
  type: MovementType
  category: string
  total: number
  movements: number
}

export type DailyProduction = { date: string; total: number; records: number }
export type DailySales = { date: string; baskets: number; eggs: number; revenue: number; orders: number }
export type ClientRanking = { clientId: string; name: string; orders: number; baskets: number; revenue: number }
export type CategorySales = { category: EggCategory; label: string; baskets: number; eggs: number }

export type StockStatistics = {
  categories: Array<{ category: EggCategory; label: string; eggs: number; baskets: number }>
  totalEggs: number
  totalBaskets: number
}

export type DashboardKpis = {
  income: number
  expense: number
  balance: number
  /** balance / income as a percentage; 0 without income. */
  marginPct: number
  produced: number
  sold: number
  /** sold / produced as a percentage; 0 without production. */
  sellThroughPct: number
}

export type DashboardSummary = {
  period: DateRange
  current: DashboardKpis
  previous?: { period: DateRange; kpis: DashboardKpis }
  /** Percentage change against the previous period; null where it was 0. */
  deltas?: Record<keyof DashboardKpis, number | null>
}

const DAY_MS = 24 * 60 * 60 * 1000

function toDay(value: string) {
  return Date.parse(`${value}T00:00:00Z`)
}

function fromDay(time: number) {
  return new Date(time).toISOString().slice(0, 10)
}

/** The period of equal length that ends the day before `range.from`. */
export function previousPeriod(range: DateRange): DateRange {
  const start = toDay(range.from)
  const days = Math.round((toDay(range.to) - start) / DAY_MS) + 1
  return { from: fromDay(start - days * DAY_MS), to: fromDay(start - DAY_MS) }
}

const percentOf = (part: number, whole: number) => (whole === 0 ? 0 : (part / whole) * 100)

function percentChange(current: number, previous: number): number | null {
  if (previous === 0) return null
  return ((current - previous) / Math.abs(previous)) * 100
}

export class ReportService {
  private readonly stock: StockService

  constructor(private readonly store: FarmStore) {
    this.stock = new StockService(store)
  }

  async balance(from: string, to: string): Promise<Balance> {
    const range = parseRange(from, to)
    return this.balanceFor(range)
  }

  async movementsByCategory(from: string, to: string): Promise<CategoryMovement[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        type: financialMovements.type,
        category: financialMovements.category,
        total: sumOf(financialMovements.amount),
        movements: countRows(),
      })
      .from(financialMovements)
      .where(this.movementsIn(range))
      .groupBy(financialMovements.type, financialMovements.category)
      .orderBy(asc(financialMovements.type), desc(sumOf(financialMovements.amount)))
  }

  async listMovements(from: string, to: string) {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(financialMovements)
      .where(this.movementsIn(range))
      .orderBy(desc(financialMovements.date), desc(financialMovements.createdAt))
  }

  /** Eggs collected against eggs sold (completed order baskets x 30). */
  async productionVsSales(from: string, to: string) {
    const range = parseRange(from, to)
    const [totalProduced, totalSold] = await Promise.all([this.eggsProduced(range), this.eggsSold(range)])
    return { totalProduced, totalSold }
  }

  async dailyProduction(from: string, to: string): Promise<DailyProduction[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        date: productionRecords.date,
        total: sumOf(rowTotal(productionRecords)),
        records: countRows(),
      })
      .from(productionRecords)
      .where(and(gte(productionRecords.date, range.from), lte(productionRecords.date, range.to)))
      .groupBy(productionRecords.date)
      .orderBy(asc(productionRecords.date))
  }

  async dailySales(from: string, to: string): Promise<DailySales[]> {
    const range = parseRange(from, to)
    const rows = await this.store.db
      .select({
        date: dispatches.date,
        baskets: sumOf(rowTotal(dispatches)),
        revenue: sumOf(orders.totalPrice),
        orders: countRows(),
      })
      .from(dispatches)
      .innerJoin(orders, eq(dispatches.orderId, orders.id))
      .where(this.salesIn(range))
      .groupBy(dispatches.date)
      .orderBy(asc(dispatches.date))
    return rows.map((row) => ({ ...row, eggs: row.baskets * EGGS_PER_BASKET }))
  }

  async topClients(from: string, to: string, limit = 10): Promise<ClientRanking[]> {
    const range = parseRange(from, to)
    const revenue = sumOf(orders.totalPrice)
    return this.store.db
      .select({
        clientId: clients.id,
        name: clients.name,
        orders: countRows(),
        baskets: sumOf(rowTotal(dispatches)),
        revenue,
      })
      .from(dispatches)
      .innerJoin(orders, eq(dispatches.orderId, orders.id))
      .innerJoin(clients, eq(orders.clientId, clients.id))
      .where(this.salesIn(range))
      .groupBy(clients.id, clients.name)
      .orderBy(desc(revenue), asc(clients.name))
      .limit(Math.max(1, Math.floor(limit)))
  }

  /** Dispatched baskets per egg category, in category order. */
  async salesByCategory(from: string, to: string): Promise<CategorySales[]> {
    const range = parseRange(from, to)
    const [row] = await this.store.db
      .select(categorySums(dispatches))
      .from(dispatches)
      .innerJoin(orders, eq(dispatches.orderId, orders.id))
      .where(this.salesIn(range))

    const counts = pickCounts(row)
    return EGG_CATEGORIES.map((category) => ({
      category,
      label: EGG_CATEGORY_LABELS[category],
      baskets: counts[category],
      eggs: counts[category] * EGGS_PER_BASKET,
    }))
  }

  /** Feed and wage expenses divided by eggs collected; 0 when none were. */
  async costPerEgg(from: string, to: string) {
    const range = parseRange(from, to)
    const [[costs], produced] = await Promise.all([
      this.store.db
        .select({ total: sumOf(financialMovements.amount) })
        .from(financialMovements)
        .where(
          and(
            this.movementsIn(range),
            eq(financialMovements.type, 'expense'),
            inArray(financialMovements.category, EGG_COST_CATEGORIES),
          ),
        ),
      this.eggsProduced(range),
    ])
    return {
      totalCost: costs.total,
      eggsProduced: produced,
      costPerEgg: produced === 0 ? 0 : costs.total / produced,
    }
  }

  async stockStatistics(): Promise<StockStatistics> {
    const { counts } = await this.stock.getEggStock()
    const categories = EGG_CATEGORIES.map((category) => ({
      category,
      label: EGG_CATEGORY_LABELS[category],
      eggs: counts[category],
      baskets: Math.floor(counts[category] / EGGS_PER_BASKET),
    }))
    const totalEggs = sumCounts(counts)
    return { categories, totalEggs, totalBaskets: Math.floor(totalEggs / EGGS_PER_BASKET) }
  }

  async dashboardSummary(from: string, to: string, options: { compare?: boolean } = {}): Promise<DashboardSummary> {
    const period = parseRange(from, to)
    const current = await this.kpis(period)
    if (!options.compare) {
      return { period, current }
    }

    const before = previousPeriod(period)
    const kpis = await this.kpis(before)
    const deltas = {
      income: percentChange(current.income, kpis.income),
      expense: percentChange(current.expense, kpis.expense),
      balance: percentChange(current.balance, kpis.balance),
      marginPct: percentChange(current.marginPct, kpis.marginPct),
      produced: percentChange(current.produced, kpis.produced),
      sold: percentChange(current.sold, kpis.sold),
      sellThroughPct: percentChange(current.sellThroughPct, kpis.sellThroughPct),
    }
    return { period, current, previous: { period: before, kpis }, deltas }
  }

  private async kpis(range: DateRange): Promise<DashboardKpis> {
    const [money, produced, sold] = await Promise.all([
      this.balanceFor(range),
      this.eggsProduced(range),
      this.eggsSold(range),
    ])
    return {
      income: money.totalIncome,
      expense: money.totalExpense,
      balance: money.balance,
      marginPct: percentOf(money.balance, money.totalIncome),
      produced,
      sold,
      sellThroughPct: percentOf(sold, produced),
    }
  }

  private async balanceFor(range: DateRange): Promise<Balance> {
    const [row] = await this.store.db
      .select({
        totalIncome: sumOf(sql`case when ${financialMovements.type} = 'income' then ${financialMovements.amount} end`),
        totalExpense: sumOf(sql`case when ${financialMovements.type} = 'expense' then ${financialMovements.amount} end`),
      })
      .from(financialMovements)
      .where(this.movementsIn(range))
    return { ...row, balance: row.totalIncome - row.totalExpense }
  }

  private async eggsProduced(range: DateRange) {
    const [row] = await this.store.db
      .select({ total: sumOf(rowTotal(productionRecords)) })
      .from(productionRecords)
      .where(and(gte(productionRecords.date, range.from), lte(productionRecords.date, range.to)))
    return row.total
  }

  /** Completed orders dated in the range, in eggs. */
  private async eggsSold(range: DateRange) {
    const [row] = await this.store.db
      .select({ baskets: sumOf(rowTotal(orders)) })
      .from(orders)
      .where(and(eq(orders.status, 'completed'), gte(orders.date, range.from), lte(orders.date, range.to)))
    return row.baskets * EGGS_PER_BASKET
  }

  private movementsIn(range: DateRange) {
    return and(gte(financialMovements.date, range.from), lte(financialMovements.date, range.to))
  }

  private salesIn(range: DateRange) {
    return and(eq(orders.status, 'completed'), gte(dispatches.date, range.from), lte(dispatches.date, range.to))
  }
}
