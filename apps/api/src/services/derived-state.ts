/**
 * Derived-state rules.
 *
 * Each rule runs inside the caller's transaction right after the event row
 * is inserted, so the event and every aggregate it touches commit or roll
 * back together:
 *
 * - production      -> egg_stock += counts
 * - adjustment      -> egg_stock += signed deltas
 * - dispatch        -> egg_stock -= baskets * 30, order completed, income
 * - supply purchase -> supply_stock += quantity, expense
 * - supply movement -> supply_stock +/- quantity
 * - worker payment  -> expense
 * - price schedule  -> every other schedule inactive
 *
 * A rule that finds its target row missing, or whose conditional update
 * matches nothing, throws `ConsistencyViolation`.
 */

import { and, eq, ne, sql } from 'drizzle-orm'
import {
  ConsistencyViolation,
  EGG_STOCK_ID,
  FarmError,
  clients,
  eggStock,
  financialMovements,
  orders,
  priceSchedules,
  supplyStock,
  type FarmTransaction,
  type Supply,
  type SupplyMovement,
  type WorkerPayment,
} from '@layerfarm/db'
import { EGGS_PER_BASKET, type EggCounts, type MovementType } from '@layerfarm/schema'
import { log } from '../lib/log.js'

/** Ledger category of dispatch income. */
export const SALES_CATEGORY = 'egg sales'
/** Ledger category of worker payment expenses. */
export const WORKER_PAYMENT_CATEGORY = 'worker payment'

async function runRule<T>(rule: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work()
  } catch (error) {
    if (error instanceof FarmError) throw error
    throw new ConsistencyViolation(rule, `Could not apply ${rule} rule`, {
      cause: error instanceof Error ? error.message : String(error),
    })
  }
}

/** `type_x = type_x + factor * deltas.x` for every category. */
function shiftedStock(deltas: EggCounts, factor: number) {
  return {
    c: sql`${eggStock.c} + ${deltas.c * factor}`,
    b: sql`${eggStock.b} + ${deltas.b * factor}`,
    a: sql`${eggStock.a} + ${deltas.a * factor}`,
    aa: sql`${eggStock.aa} + ${deltas.aa * factor}`,
    aaa: sql`${eggStock.aaa} + ${deltas.aaa * factor}`,
    jumbo: sql`${eggStock.jumbo} + ${deltas.jumbo * factor}`,
  }
}

async function shiftEggStock(
  tx: FarmTransaction,
  rule: string,
  deltas: EggCounts,
  factor: number,
  moment?: { date: string; time: string },
) {
  const rows = await tx
    .update(eggStock)
    .set({ ...shiftedStock(deltas, factor), ...(moment ?? {}), updatedAt: new Date() })
    .where(eq(eggStock.id, EGG_STOCK_ID))
    .returning({ id: eggStock.id })
  if (rows.length === 0) {
    throw new ConsistencyViolation(rule, 'Egg stock row is missing')
  }
}

type MovementEntry = {
  date: string
  type: MovementType
  category: string
  amount: number
  description: string
  referenceId: string
  referenceTable: string
}

async function bookMovement(tx: FarmTransaction, entry: MovementEntry) {
  const [movement] = await tx.insert(financialMovements).values(entry).returning({ id: financialMovements.id })
  return movement.id
}

export function applyProduction(
  tx: FarmTransaction,
  record: EggCounts & { id: string; date: string; time: string },
) {
  return runRule('production', async () => {
    await shiftEggStock(tx, 'production', record, 1, { date: record.date, time: record.time })
    log.debug(`production ${record.id} added to egg stock`)
  })
}

/** Deltas already carry their sign; loss rows arrive negated. */
export function applyAdjustment(tx: FarmTransaction, adjustment: EggCounts & { id: string }) {
  return runRule('adjustment', async () => {
    await shiftEggStock(tx, 'adjustment', adjustment, 1)
    log.debug(`adjustment ${adjustment.id} applied to egg stock`)
  })
}

/**
 * Dispatch: stock leaves in whole baskets, the order completes and its
 * total price is booked as income. No stock sufficiency check: totals may
 * go negative.
 */
export function applyDispatch(
  tx: FarmTransaction,
  dispatch: EggCounts & { id: string; orderId: string; date: string },
) {
  return runRule('dispatch', async () => {
    await shiftEggStock(tx, 'dispatch', dispatch, -EGGS_PER_BASKET)

    const [completed] = await tx
      .update(orders)
      .set({ status: 'completed' })
      .where(and(eq(orders.id, dispatch.orderId), eq(orders.status, 'pending')))
      .returning({ id: orders.id, clientId: orders.clientId, totalPrice: orders.totalPrice })
    if (!completed) {
      throw new ConsistencyViolation('dispatch', 'Order could not be completed', {
        order_id: dispatch.orderId,
      })
    }

    const client = await tx.query.clients.findFirst({ where: eq(clients.id, completed.clientId) })
    if (!client) {
      throw new ConsistencyViolation('dispatch', 'Order client is missing', {
        order_id: completed.id,
        client_id: completed.clientId,
      })
    }

    await bookMovement(tx, {
      date: dispatch.date,
      type: 'income',
      category: SALES_CATEGORY,
      amount: completed.totalPrice,
      description: `Order ${completed.id} - ${client.name}`,
      referenceId: completed.id,
      referenceTable: 'orders',
    })
    log.debug(`dispatch ${dispatch.id} completed order ${completed.id}`)
  })
}

/**
 * Purchase: adds the quantity to the item's stock row, creating it with a
 * zero threshold on first purchase, and books the cost as an expense under
 * the supply category. Returns the stock row id.
 */
export function applySupplyPurchase(tx: FarmTransaction, purchase: Supply) {
  return runRule('supply purchase', async () => {
    const existing = await tx.query.supplyStock.findFirst({
      where: eq(supplyStock.itemKey, purchase.itemKey),
    })

    let stockId: string
    if (existing) {
      const [updated] = await tx
        .update(supplyStock)
        .set({
          currentQuantity: sql`${supplyStock.currentQuantity} + ${purchase.quantity}`,
          updatedAt: new Date(),
        })
        .where(eq(supplyStock.id, existing.id))
        .returning({ id: supplyStock.id })
      if (!updated) {
        throw new ConsistencyViolation('supply purchase', 'Supply stock row vanished', {
          supply_stock_id: existing.id,
        })
      }
      stockId = updated.id
    } else {
      const [created] = await tx
        .insert(supplyStock)
        .values({
          itemKey: purchase.itemKey,
          name: purchase.name,
          category: purchase.category,
          unit: purchase.unit,
          currentQuantity: purchase.quantity,
          minimumQuantity: 0,
        })
        .returning({ id: supplyStock.id })
      stockId = created.id
    }

    await bookMovement(tx, {
      date: purchase.purchaseDate,
      type: 'expense',
      category: purchase.category,
      amount: purchase.totalCost,
      description: `${purchase.name} - ${purchase.quantity} ${purchase.unit}`,
      referenceId: purchase.id,
      referenceTable: 'supplies',
    })
    log.debug(`purchase ${purchase.id} added to supply stock ${stockId}`)
    return stockId
  })
}

export function applySupplyMovement(tx: FarmTransaction, movement: SupplyMovement) {
  return runRule('supply movement', async () => {
    const signed = movement.kind === 'out' ? -movement.quantity : movement.quantity
    const [updated] = await tx
      .update(supplyStock)
      .set({
        currentQuantity: sql`${supplyStock.currentQuantity} + ${signed}`,
        updatedAt: new Date(),
      })
      .where(eq(supplyStock.id, movement.supplyStockId))
      .returning({ id: supplyStock.id })
    if (!updated) {
      throw new ConsistencyViolation('supply movement', 'Supply stock row is missing', {
        supply_stock_id: movement.supplyStockId,
      })
    }
    log.debug(`supply movement ${movement.id} (${movement.kind} ${movement.quantity}) applied`)
  })
}

export function applyWorkerPayment(tx: FarmTransaction, payment: WorkerPayment, workerName: string) {
  return runRule('worker payment', async () => {
    await bookMovement(tx, {
      date: payment.date,
      type: 'expense',
      category: WORKER_PAYMENT_CATEGORY,
      amount: payment.amount,
      description: `Payment to ${workerName} - ${payment.concept ?? 'no concept'}`,
      referenceId: payment.id,
      referenceTable: 'worker_payments',
    })
    log.debug(`payment ${payment.id} booked as expense`)
  })
}

/** Leaves `scheduleId` as the only active schedule. */
export function activatePriceSchedule(tx: FarmTransaction, scheduleId: string) {
  return runRule('price schedule', async () => {
    await tx
      .update(priceSchedules)
      .set({ active: false })
      .where(and(ne(priceSchedules.id, scheduleId), eq(priceSchedules.active, true)))
    const [activated] = await tx
      .update(priceSchedules)
      .set({ active: true })
      .where(eq(priceSchedules.id, scheduleId))
      .returning({ id: priceSchedules.id })
    if (!activated) {
      throw new ConsistencyViolation('price schedule', 'Price schedule row is missing', {
        price_schedule_id: scheduleId,
      })
    }
  })
}
