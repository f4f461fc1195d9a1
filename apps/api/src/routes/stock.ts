/**
 * Stock routes: egg stock with its manual adjustments, and supply stock
 * with usage, intake, counts and thresholds.
 */

import { Hono } from 'hono'
import {
  adjustEggStockSchema,
  setMinimumQuantitySchema,
  setSupplyQuantitySchema,
  supplyMovementSchema,
} from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

/** Movement body without the id, which comes from the path. */
const movementBodySchema = supplyMovementSchema.omit({ supplyStockId: true })

export function stockRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.get('/stock/eggs', async (c) => {
    return ok(c, await services.stock.getEggStock())
  })

  routes.get('/stock/eggs/available-baskets', async (c) => {
    return ok(c, await services.orders.availableBaskets())
  })

  routes.post('/stock/eggs/adjustments', async (c) => {
    const input = await readBody(c, adjustEggStockSchema)
    const id = await services.stock.adjustEggStock(input)
    return ok(c, { id }, 201)
  })

  routes.get('/stock/eggs/adjustments', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.stock.listAdjustments(from, to))
  })

  routes.get('/stock/supplies', async (c) => {
    return ok(c, await services.stock.listSupplyStock())
  })

  routes.get('/stock/supplies/alerts', async (c) => {
    return ok(c, await services.stock.listStockAlerts())
  })

  routes.get('/stock/supplies/movements', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.stock.listSupplyMovements(from, to))
  })

  routes.get('/stock/supplies/:id', async (c) => {
    return ok(c, await services.stock.getSupplyStock(c.req.param('id')))
  })

  routes.post('/stock/supplies/:id/usage', async (c) => {
    const body = await readBody(c, movementBodySchema)
    const id = await services.stock.recordSupplyUsage({ ...body, supplyStockId: c.req.param('id') })
    return ok(c, { id }, 201)
  })

  routes.post('/stock/supplies/:id/intake', async (c) => {
    const body = await readBody(c, movementBodySchema)
    const id = await services.stock.recordSupplyIntake({ ...body, supplyStockId: c.req.param('id') })
    return ok(c, { id }, 201)
  })

  routes.put('/stock/supplies/:id/quantity', async (c) => {
    const body = await readBody(c, setSupplyQuantitySchema)
    return ok(c, await services.stock.setSupplyQuantity(c.req.param('id'), body))
  })

  routes.put('/stock/supplies/:id/minimum', async (c) => {
    const body = await readBody(c, setMinimumQuantitySchema)
    return ok(c, await services.stock.setMinimumQuantity(c.req.param('id'), body))
  })

  return routes
}
