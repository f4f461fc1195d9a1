/**
 * Order routes: the pending queue, edits, cancellation and dispatch.
 */

import { Hono } from 'hono'
import { createOrderSchema, dispatchOrderSchema, updateOrderSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

export function orderRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.post('/orders', async (c) => {
    const input = await readBody(c, createOrderSchema)
    const id = await services.orders.createOrder(input)
    return ok(c, { id }, 201)
  })

  routes.get('/orders/pending', async (c) => {
    return ok(c, await services.orders.listPendingOrders())
  })

  routes.get('/orders/history', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.orders.listSalesHistory(from, to))
  })

  routes.get('/orders/:id', async (c) => {
    return ok(c, await services.orders.getOrder(c.req.param('id')))
  })

  routes.put('/orders/:id', async (c) => {
    const input = await readBody(c, updateOrderSchema)
    return ok(c, await services.orders.updateOrder(c.req.param('id'), input))
  })

  routes.post('/orders/:id/cancel', async (c) => {
    return ok(c, await services.orders.cancelOrder(c.req.param('id')))
  })

  routes.post('/orders/:id/dispatch', async (c) => {
    const input = await readBody(c, dispatchOrderSchema)
    const id = await services.orders.dispatchOrder(c.req.param('id'), input)
    return ok(c, { id }, 201)
  })

  return routes
}
