/**
 * Egg stock and supply stock.
 *
 * Egg stock changes only through production, dispatch and the adjustments
 * recorded here. Supply stock changes through purchases (see purchases.ts)
 * and the in/out movements recorded here.
 */

import { and, asc, desc, eq, gte, lte } from 'drizzle-orm'
import {
  ConsistencyViolation,
  EGG_STOCK_ID,
  ReferentialErrors,
  ValidationError,
  ValidationErrors,
  eggStock,
  eggStockAdjustments,
  supplyMovements,
  supplyStock,
  type EggStockAdjustment,
  type FarmExecutor,
  type FarmStore,
  type FarmTransaction,
  type SupplyStockRow,
} from '@layerfarm/db'
import {
  EGG_CATEGORIES,
  adjustEggStockSchema,
  currentDate,
  currentTime,
  setMinimumQuantitySchema,
  setSupplyQuantitySchema,
  sumCounts,
  supplyMovementSchema,
  type AdjustEggStockInput,
  type EggCounts,
  type SupplyMovementInput,
  type SupplyMovementKind,
} from '@layerfarm/schema'
import { applyAdjustment, applySupplyMovement } from './derived-state.js'
import { pickCounts } from './_sql.js'
import { parseInput, parseRange } from './validation.js'

export type EggStockSnapshot = {
  counts: EggCounts
  total: number
  /** Date and time of the latest production added to the stock. */
  date: string
  time: string
  updatedAt: Date
}

export type SupplyStockItem = SupplyStockRow & { alert: boolean }

export type SupplyMovementEntry = {
  id: string
  date: string
  time: string
  supplyStockId: string
  name: string
  category: SupplyStockRow['category']
  unit: SupplyStockRow['unit']
  kind: SupplyMovementKind
  quantity: number
  reason: string | null
}

export type SupplyQuantityChange = {
  supplyStockId: string
  currentQuantity: number
  /** Movement recording the difference; null when the count already matched. */
  movementId: string | null
}

const withAlert = (row: SupplyStockRow): SupplyStockItem => ({
  ...row,
  alert: row.currentQuantity <= row.minimumQuantity,
})

async function findSupplyStock(db: FarmExecutor, id: string) {
  const row = await db.query.supplyStock.findFirst({ where: eq(supplyStock.id, id) })
  if (!row) {
    throw ReferentialErrors.SUPPLY_NOT_FOUND(id)
  }
  return row
}

export class StockService {
  constructor(private readonly store: FarmStore) {}

  // ============================================
  // EGGS
  // ============================================

  async getEggStock(): Promise<EggStockSnapshot> {
    const row = await this.store.db.query.eggStock.findFirst({ where: eq(eggStock.id, EGG_STOCK_ID) })
    if (!row) {
      throw new ConsistencyViolation('egg stock', 'Egg stock row is missing')
    }
    const counts = pickCounts(row)
    return { counts, total: sumCounts(counts), date: row.date, time: row.time, updatedAt: row.updatedAt }
  }

  /**
   * Records a manual egg stock change.
   *
   * `loss` takes non-negative magnitudes and stores/applies them negated.
   * `correction` takes signed deltas as they are.
   */
  async adjustEggStock(input: AdjustEggStockInput): Promise<string> {
    const data = parseInput(adjustEggStockSchema, input)

    if (data.kind === 'loss') {
      for (const category of EGG_CATEGORIES) {
        if (data.deltas[category] < 0) {
          throw ValidationErrors.INVALID_FIELD(`deltas.${category}`, 'loss quantities must not be negative')
        }
      }
    }
    if (EGG_CATEGORIES.every((category) => data.deltas[category] === 0)) {
      throw ValidationErrors.ALL_ZERO('deltas')
    }

    const applied = { ...data.deltas }
    if (data.kind === 'loss') {
      for (const category of EGG_CATEGORIES) {
        applied[category] = data.deltas[category] === 0 ? 0 : -data.deltas[category]
      }
    }

    return this.store.transaction(async (tx) => {
      const [adjustment] = await tx
        .insert(eggStockAdjustments)
        .values({
          date: data.date ?? currentDate(),
          time: data.time ?? currentTime(),
          kind: data.kind,
          ...applied,
          reason: data.reason ?? null,
        })
        .returning()
      await applyAdjustment(tx, adjustment)
      return adjustment.id
    })
  }

  async listAdjustments(from: string, to: string): Promise<EggStockAdjustment[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(eggStockAdjustments)
      .where(and(gte(eggStockAdjustments.date, range.from), lte(eggStockAdjustments.date, range.to)))
      .orderBy(desc(eggStockAdjustments.date), desc(eggStockAdjustments.time))
  }

  // ============================================
  // SUPPLIES
  // ============================================

  async listSupplyStock(): Promise<SupplyStockItem[]> {
    const rows = await this.store.db
      .select()
      .from(supplyStock)
      .orderBy(asc(supplyStock.category), asc(supplyStock.name))
    return rows.map(withAlert)
  }

  async getSupplyStock(id: string): Promise<SupplyStockItem> {
    return withAlert(await findSupplyStock(this.store.db, id))
  }

  /** Items at or below their minimum quantity. */
  async listStockAlerts(): Promise<SupplyStockItem[]> {
    const rows = await this.store.db
      .select()
      .from(supplyStock)
      .where(lte(supplyStock.currentQuantity, supplyStock.minimumQuantity))
      .orderBy(asc(supplyStock.category), asc(supplyStock.name))
    return rows.map(withAlert)
  }

  /** Consumption: an `out` movement that lowers the item's quantity. */
  recordSupplyUsage(input: SupplyMovementInput): Promise<string> {
    return this.recordSupplyMovement('out', input)
  }

  /** Stock received outside a purchase (donation, return): an `in` movement. */
  recordSupplyIntake(input: SupplyMovementInput): Promise<string> {
    return this.recordSupplyMovement('in', input)
  }

  /**
   * Sets an item to a counted quantity. The difference is recorded as an
   * in/out movement so the movement history still explains the stock.
   */
  async setSupplyQuantity(
    supplyStockId: string,
    input: { quantity: number; reason?: string },
  ): Promise<SupplyQuantityChange> {
    const data = parseInput(setSupplyQuantitySchema, input)

    return this.store.transaction(async (tx) => {
      const item = await findSupplyStock(tx, supplyStockId)
      const difference = data.quantity - item.currentQuantity
      if (difference === 0) {
        return { supplyStockId, currentQuantity: item.currentQuantity, movementId: null }
      }

      const movementId = await this.insertMovement(tx, {
        supplyStockId,
        kind: difference > 0 ? 'in' : 'out',
        quantity: Math.abs(difference),
        reason: data.reason ?? 'Stock count correction',
        date: currentDate(),
        time: currentTime(),
      })
      const updated = await findSupplyStock(tx, supplyStockId)
      return { supplyStockId, currentQuantity: updated.currentQuantity, movementId }
    })
  }

  async setMinimumQuantity(supplyStockId: string, input: { minimum: number }): Promise<SupplyStockItem> {
    const data = parseInput(setMinimumQuantitySchema, input)
    const [updated] = await this.store.db
      .update(supplyStock)
      .set({ minimumQuantity: data.minimum, updatedAt: new Date() })
      .where(eq(supplyStock.id, supplyStockId))
      .returning()
    if (!updated) {
      throw ReferentialErrors.SUPPLY_NOT_FOUND(supplyStockId)
    }
    return withAlert(updated)
  }

  async listSupplyMovements(from: string, to: string): Promise<SupplyMovementEntry[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        id: supplyMovements.id,
        date: supplyMovements.date,
        time: supplyMovements.time,
        supplyStockId: supplyMovements.supplyStockId,
        name: supplyStock.name,
        category: supplyStock.category,
        unit: supplyStock.unit,
        kind: supplyMovements.kind,
        quantity: supplyMovements.quantity,
        reason: supplyMovements.reason,
      })
      .from(supplyMovements)
      .innerJoin(supplyStock, eq(supplyMovements.supplyStockId, supplyStock.id))
      .where(and(gte(supplyMovements.date, range.from), lte(supplyMovements.date, range.to)))
      .orderBy(desc(supplyMovements.date), desc(supplyMovements.time))
  }

  private async recordSupplyMovement(kind: SupplyMovementKind, input: SupplyMovementInput) {
    const data = parseInput(supplyMovementSchema, input)
    return this.store.transaction(async (tx) => {
      await findSupplyStock(tx, data.supplyStockId)
      return this.insertMovement(tx, {
        supplyStockId: data.supplyStockId,
        kind,
        quantity: data.quantity,
        reason: data.reason ?? null,
        date: data.date ?? currentDate(),
        time: data.time ?? currentTime(),
      })
    })
  }

  private async insertMovement(
    tx: FarmTransaction,
    values: {
      supplyStockId: string
      kind: SupplyMovementKind
      quantity: number
      reason: string | null
      date: string
      time: string
    },
  ) {
    if (!(values.quantity > 0)) {
      throw new ValidationError('Invalid quantity: must be positive', { field: 'quantity' })
    }
    const [movement] = await tx.insert(supplyMovements).values(values).returning()
    await applySupplyMovement(tx, movement)
    return movement.id
  }
}
