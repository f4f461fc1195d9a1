import { Hono } from 'hono'
import { supplyPurchaseSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

export function purchaseRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.post('/purchases', async (c) => {
    const input = await readBody(c, supplyPurchaseSchema)
    return ok(c, await services.purchases.registerSupplyPurchase(input), 201)
  })

  routes.get('/purchases', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.purchases.listPurchases(from, to))
  })

  routes.get('/purchases/by-category', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.purchases.purchasesByCategory(from, to))
  })

  return routes
}
