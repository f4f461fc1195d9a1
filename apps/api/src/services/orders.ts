/**
 * Orders and their dispatch.
 *
 * An order is created `pending`, can be edited or cancelled while pending,
 * and is completed only by recording its single dispatch.
 */

import { and, asc, desc, eq, gte, lte } from 'drizzle-orm'
import {
  ReferentialErrors,
  StateErrors,
  ValidationErrors,
  clients,
  dispatches,
  orders,
  type FarmExecutor,
  type FarmStore,
  type Order,
} from '@layerfarm/db'
import {
  EGG_CATEGORIES,
  EGGS_PER_BASKET,
  createOrderSchema,
  dispatchOrderSchema,
  sumCounts,
  updateOrderSchema,
  type CreateOrderInput,
  type DispatchOrderInput,
  type EggCounts,
  type UpdateOrderInput,
} from '@layerfarm/schema'
import { applyDispatch } from './derived-state.js'
import { rowTotal } from './_sql.js'
import { StockService } from './stock.js'
import { parseInput, parseRange } from './validation.js'

export type PendingOrder = Order & { clientName: string; totalBaskets: number }

export type SaleEntry = {
  orderId: string
  clientId: string
  clientName: string
  orderDate: string
  dispatchDate: string
  dispatchTime: string
  c: number
  b: number
  a: number
  aa: number
  aaa: number
  jumbo: number
  totalBaskets: number
  totalPrice: number
}

async function findOrder(db: FarmExecutor, id: string) {
  const order = await db.query.orders.findFirst({ where: eq(orders.id, id) })
  if (!order) {
    throw ReferentialErrors.ORDER_NOT_FOUND(id)
  }
  return order
}

export class OrderService {
  private readonly stock: StockService

  constructor(private readonly store: FarmStore) {
    this.stock = new StockService(store)
  }

  async createOrder(input: CreateOrderInput): Promise<string> {
    const data = parseInput(createOrderSchema, input)
    if (sumCounts(data.baskets) === 0) {
      throw ValidationErrors.ALL_ZERO('baskets')
    }

    return this.store.transaction(async (tx) => {
      const client = await tx.query.clients.findFirst({ where: eq(clients.id, data.clientId) })
      if (!client) {
        throw ReferentialErrors.CLIENT_NOT_FOUND(data.clientId)
      }
      if (!client.active) {
        throw StateErrors.CLIENT_INACTIVE(client.id)
      }

      const [order] = await tx
        .insert(orders)
        .values({
          clientId: client.id,
          date: data.date,
          time: data.time,
          ...data.baskets,
          totalPrice: data.totalPrice,
          note: data.note ?? null,
        })
        .returning({ id: orders.id })
      return order.id
    })
  }

  listPendingOrders(): Promise<PendingOrder[]> {
    return this.store.db
      .select({
        id: orders.id,
        clientId: orders.clientId,
        date: orders.date,
        time: orders.time,
        c: orders.c,
        b: orders.b,
        a: orders.a,
        aa: orders.aa,
        aaa: orders.aaa,
        jumbo: orders.jumbo,
        totalPrice: orders.totalPrice,
        status: orders.status,
        note: orders.note,
        createdAt: orders.createdAt,
        clientName: clients.name,
        totalBaskets: rowTotal(orders).mapWith(Number),
      })
      .from(orders)
      .innerJoin(clients, eq(orders.clientId, clients.id))
      .where(eq(orders.status, 'pending'))
      .orderBy(asc(orders.date), asc(orders.time))
  }

  getOrder(id: string): Promise<Order> {
    return findOrder(this.store.db, id)
  }

  async updateOrder(id: string, input: UpdateOrderInput): Promise<Order> {
    const data = parseInput(updateOrderSchema, input)
    if (sumCounts(data.baskets) === 0) {
      throw ValidationErrors.ALL_ZERO('baskets')
    }

    return this.store.transaction(async (tx) => {
      const order = await findOrder(tx, id)
      if (order.status !== 'pending') {
        throw StateErrors.ORDER_NOT_PENDING(id, order.status)
      }
      const [updated] = await tx
        .update(orders)
        .set({ ...data.baskets, totalPrice: data.totalPrice, note: data.note ?? null })
        .where(and(eq(orders.id, id), eq(orders.status, 'pending')))
        .returning()
      return updated
    })
  }

  /** Pending becomes cancelled; cancelling twice is a no-op. */
  async cancelOrder(id: string): Promise<Order> {
    return this.store.transaction(async (tx) => {
      const order = await findOrder(tx, id)
      if (order.status === 'cancelled') {
        return order
      }
      if (order.status !== 'pending') {
        throw StateErrors.ORDER_NOT_PENDING(id, order.status)
      }
      const [cancelled] = await tx
        .update(orders)
        .set({ status: 'cancelled' })
        .where(eq(orders.id, id))
        .returning()
      return cancelled
    })
  }

  /**
   * Records the dispatch of a pending order. The baskets sent may differ
   * from the ones ordered; stock is not checked and may go negative.
   */
  async dispatchOrder(orderId: string, input: DispatchOrderInput): Promise<string> {
    const data = parseInput(dispatchOrderSchema, input)

    return this.store.transaction(async (tx) => {
      const order = await findOrder(tx, orderId)
      if (order.status !== 'pending') {
        throw StateErrors.ORDER_NOT_PENDING(orderId, order.status)
      }

      const [dispatch] = await tx
        .insert(dispatches)
        .values({
          orderId,
          date: data.date,
          time: data.time,
          ...data.baskets,
          note: data.note ?? null,
        })
        .returning()
      await applyDispatch(tx, dispatch)
      return dispatch.id
    })
  }

  /** Completed orders whose dispatch falls in the range, newest first. */
  async listSalesHistory(from: string, to: string): Promise<SaleEntry[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        orderId: orders.id,
        clientId: clients.id,
        clientName: clients.name,
        orderDate: orders.date,
        dispatchDate: dispatches.date,
        dispatchTime: dispatches.time,
        c: dispatches.c,
        b: dispatches.b,
        a: dispatches.a,
        aa: dispatches.aa,
        aaa: dispatches.aaa,
        jumbo: dispatches.jumbo,
        totalBaskets: rowTotal(dispatches).mapWith(Number),
        totalPrice: orders.totalPrice,
      })
      .from(dispatches)
      .innerJoin(orders, eq(dispatches.orderId, orders.id))
      .innerJoin(clients, eq(orders.clientId, clients.id))
      .where(
        and(
          eq(orders.status, 'completed'),
          gte(dispatches.date, range.from),
          lte(dispatches.date, range.to),
        ),
      )
      .orderBy(desc(dispatches.date), desc(dispatches.time))
  }

  /** Whole baskets the current stock could fill, per category. Never negative. */
  async availableBaskets(): Promise<EggCounts> {
    const { counts } = await this.stock.getEggStock()
    const baskets = { ...counts }
    for (const category of EGG_CATEGORIES) {
      baskets[category] = Math.max(0, Math.floor(counts[category] / EGGS_PER_BASKET))
    }
    return baskets
  }
}
