import { and, desc, gte, lte } from 'drizzle-orm'
import {
  chickenPopulation,
  feedConsumption,
  type ChickenPopulation,
  type FarmStore,
  type FeedConsumption,
} from '@layerfarm/db'
import {
  recordFeedConsumptionSchema,
  recordPopulationSchema,
  type RecordFeedConsumptionInput,
  type RecordPopulationInput,
} from '@layerfarm/schema'
import { parseInput, parseRange } from './validation.js'

export type CurrentPopulation = {
  totalCount: number
  discards: number
  /** Null when no head count has been recorded yet. */
  date: string | null
  time: string | null
}

/** Head counts and daily feed rations. Neither touches derived state. */
export class FlockService {
  constructor(private readonly store: FarmStore) {}

  async recordPopulation(input: RecordPopulationInput): Promise<string> {
    const data = parseInput(recordPopulationSchema, input)
    const [row] = await this.store.db
      .insert(chickenPopulation)
      .values({
        date: data.date,
        time: data.time,
        totalCount: data.totalCount,
        discards: data.discards,
        note: data.note ?? null,
      })
      .returning({ id: chickenPopulation.id })
    return row.id
  }

  async getCurrentPopulation(): Promise<CurrentPopulation> {
    const latest = await this.store.db.query.chickenPopulation.findFirst({
      orderBy: [desc(chickenPopulation.date), desc(chickenPopulation.time)],
    })
    if (!latest) {
      return { totalCount: 0, discards: 0, date: null, time: null }
    }
    return { totalCount: latest.totalCount, discards: latest.discards, date: latest.date, time: latest.time }
  }

  async listPopulation(from: string, to: string): Promise<ChickenPopulation[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(chickenPopulation)
      .where(and(gte(chickenPopulation.date, range.from), lte(chickenPopulation.date, range.to)))
      .orderBy(desc(chickenPopulation.date), desc(chickenPopulation.time))
  }

  /** Stores the ration with `totalGrams = perBirdGrams * birdCount`. */
  async recordFeedConsumption(input: RecordFeedConsumptionInput): Promise<string> {
    const data = parseInput(recordFeedConsumptionSchema, input)
    const [row] = await this.store.db
      .insert(feedConsumption)
      .values({
        date: data.date,
        time: data.time,
        perBirdGrams: data.perBirdGrams,
        birdCount: data.birdCount,
        totalGrams: data.perBirdGrams * data.birdCount,
        note: data.note ?? null,
      })
      .returning({ id: feedConsumption.id })
    return row.id
  }

  async listFeedConsumption(from: string, to: string): Promise<FeedConsumption[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(feedConsumption)
      .where(and(gte(feedConsumption.date, range.from), lte(feedConsumption.date, range.to)))
      .orderBy(desc(feedConsumption.date), desc(feedConsumption.time))
  }
}
