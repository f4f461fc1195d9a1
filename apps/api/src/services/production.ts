import { and, desc, eq, gte, lte } from 'drizzle-orm'
import {
  ValidationErrors,
  productionRecords,
  type FarmStore,
  type ProductionRecord,
} from '@layerfarm/db'
import {
  dateSchema,
  recordProductionSchema,
  sumCounts,
  type EggCounts,
  type RecordProductionInput,
} from '@layerfarm/schema'
import { applyProduction } from './derived-state.js'
import { categorySums, countRows, pickCounts } from './_sql.js'
import { parseInput, parseRange } from './validation.js'

export type ProductionTotals = {
  counts: EggCounts
  total: number
  records: number
}

export class ProductionService {
  constructor(private readonly store: FarmStore) {}

  /**
   * Records one collection event and adds it to the egg stock.
   * Counts are eggs, not baskets; at least one must be non-zero.
   */
  async recordProduction(input: RecordProductionInput): Promise<string> {
    const data = parseInput(recordProductionSchema, input)
    if (sumCounts(data.counts) === 0) {
      throw ValidationErrors.ALL_ZERO('counts')
    }

    return this.store.transaction(async (tx) => {
      const [record] = await tx
        .insert(productionRecords)
        .values({ date: data.date, time: data.time, ...data.counts, note: data.note ?? null })
        .returning()
      await applyProduction(tx, record)
      return record.id
    })
  }

  /** Records between two dates (inclusive), newest first. */
  async listByRange(from: string, to: string): Promise<ProductionRecord[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(productionRecords)
      .where(and(gte(productionRecords.date, range.from), lte(productionRecords.date, range.to)))
      .orderBy(desc(productionRecords.date), desc(productionRecords.time))
  }

  async listForDay(date: string): Promise<ProductionRecord[]> {
    const day = parseInput(dateSchema, date)
    return this.store.db
      .select()
      .from(productionRecords)
      .where(eq(productionRecords.date, day))
      .orderBy(desc(productionRecords.time))
  }

  async totalsForRange(from: string, to: string): Promise<ProductionTotals> {
    const range = parseRange(from, to)
    const [row] = await this.store.db
      .select({ ...categorySums(productionRecords), records: countRows() })
      .from(productionRecords)
      .where(and(gte(productionRecords.date, range.from), lte(productionRecords.date, range.to)))

    const counts = pickCounts(row)
    return { counts, total: sumCounts(counts), records: row.records }
  }
}
