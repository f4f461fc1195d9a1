import { and, asc, desc, eq, gte, lte } from 'drizzle-orm'
import { ValidationErrors, supplies, supplyStock, type FarmStore, type Supply } from '@layerfarm/db'
import { supplyPurchaseSchema, type SupplyCategory, type SupplyPurchaseInput } from '@layerfarm/schema'
import { applySupplyPurchase } from './derived-state.js'
import { countRows, sumOf } from './_sql.js'
import { parseInput, parseRange } from './validation.js'

export type PurchaseReceipt = {
  purchaseId: string
  supplyStockId: string
}

export type CategorySpend = {
  category: SupplyCategory
  purchases: number
  totalCost: number
}

/** Stock rows are matched on the trimmed, lower-cased item name. */
export function itemKeyOf(name: string): string {
  return name.trim().toLowerCase()
}

export class PurchaseService {
  constructor(private readonly store: FarmStore) {}

  /**
   * Appends a purchase, adds it to the item's stock and books its cost.
   * A repeat purchase of an item must use the unit it is stocked in.
   */
  async registerSupplyPurchase(input: SupplyPurchaseInput): Promise<PurchaseReceipt> {
    const data = parseInput(supplyPurchaseSchema, input)
    const itemKey = itemKeyOf(data.name)

    return this.store.transaction(async (tx) => {
      const stocked = await tx.query.supplyStock.findFirst({ where: eq(supplyStock.itemKey, itemKey) })
      if (stocked && stocked.unit !== data.unit) {
        throw ValidationErrors.UNIT_MISMATCH(stocked.name, stocked.unit, data.unit)
      }

      const [purchase] = await tx
        .insert(supplies)
        .values({
          name: data.name,
          itemKey,
          category: data.category,
          unit: data.unit,
          quantity: data.quantity,
          unitCost: data.unitCost,
          totalCost: data.totalCost,
          purchaseDate: data.purchaseDate,
          supplier: data.supplier ?? null,
        })
        .returning()
      const supplyStockId = await applySupplyPurchase(tx, purchase)
      return { purchaseId: purchase.id, supplyStockId }
    })
  }

  async listPurchases(from: string, to: string): Promise<Supply[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(supplies)
      .where(and(gte(supplies.purchaseDate, range.from), lte(supplies.purchaseDate, range.to)))
      .orderBy(desc(supplies.purchaseDate), desc(supplies.createdAt))
  }

  async purchasesByCategory(from: string, to: string): Promise<CategorySpend[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        category: supplies.category,
        purchases: countRows(),
        totalCost: sumOf(supplies.totalCost),
      })
      .from(supplies)
      .where(and(gte(supplies.purchaseDate, range.from), lte(supplies.purchaseDate, range.to)))
      .groupBy(supplies.category)
      .orderBy(asc(supplies.category))
  }
}
