import { desc, eq } from 'drizzle-orm'
import { StateErrors, priceSchedules, type FarmStore, type PriceSchedule } from '@layerfarm/db'
import {
  EGG_CATEGORIES,
  EGGS_PER_BASKET,
  basketCountsSchema,
  createPriceScheduleSchema,
  type EggCounts,
} from '@layerfarm/schema'
import { activatePriceSchedule } from './derived-state.js'
import { parseInput } from './validation.js'

export type UnitPrices = EggCounts

export type OrderQuote = {
  scheduleId: string
  /** Price per category: baskets x 30 x unit price. */
  lines: EggCounts
  total: number
}

export function unitPrices(schedule: PriceSchedule): UnitPrices {
  return {
    c: schedule.priceC,
    b: schedule.priceB,
    a: schedule.priceA,
    aa: schedule.priceAa,
    aaa: schedule.priceAaa,
    jumbo: schedule.priceJumbo,
  }
}

export class PriceService {
  constructor(private readonly store: FarmStore) {}

  async getActivePriceSchedule(): Promise<PriceSchedule | null> {
    const schedule = await this.store.db.query.priceSchedules.findFirst({
      where: eq(priceSchedules.active, true),
      orderBy: [desc(priceSchedules.createdAt)],
    })
    return schedule ?? null
  }

  /** Inserts the schedule and leaves it as the only active one. */
  async createPriceSchedule(effectiveDate: string, prices: UnitPrices): Promise<string> {
    const data = parseInput(createPriceScheduleSchema, { effectiveDate, prices })

    return this.store.transaction(async (tx) => {
      const [schedule] = await tx
        .insert(priceSchedules)
        .values({
          effectiveDate: data.effectiveDate,
          priceC: data.prices.c,
          priceB: data.prices.b,
          priceA: data.prices.a,
          priceAa: data.prices.aa,
          priceAaa: data.prices.aaa,
          priceJumbo: data.prices.jumbo,
          active: true,
        })
        .returning({ id: priceSchedules.id })
      await activatePriceSchedule(tx, schedule.id)
      return schedule.id
    })
  }

  listPriceHistory(limit = 10): Promise<PriceSchedule[]> {
    return this.store.db
      .select()
      .from(priceSchedules)
      .orderBy(desc(priceSchedules.createdAt))
      .limit(Math.max(1, Math.floor(limit)))
  }

  async quoteOrder(baskets: Partial<EggCounts>): Promise<OrderQuote> {
    const counts = parseInput(basketCountsSchema, baskets)
    const schedule = await this.getActivePriceSchedule()
    if (!schedule) {
      throw StateErrors.NO_ACTIVE_PRICE()
    }

    const prices = unitPrices(schedule)
    const lines = { ...counts }
    let total = 0
    for (const category of EGG_CATEGORIES) {
      lines[category] = counts[category] * EGGS_PER_BASKET * prices[category]
      total += lines[category]
    }
    return { scheduleId: schedule.id, lines, total }
  }
}
