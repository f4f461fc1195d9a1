import { Hono } from 'hono'
import { basketCountsSchema, createPriceScheduleSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { limitQuery, ok, readBody } from './_api.js'

export function priceRoutes(services: FarmServices) {
  const routes = new Hono()

  /** `data` is null until a schedule has been set. */
  routes.get('/prices/active', async (c) => {
    return ok(c, await services.prices.getActivePriceSchedule())
  })

  routes.post('/prices', async (c) => {
    const input = await readBody(c, createPriceScheduleSchema)
    const id = await services.prices.createPriceSchedule(input.effectiveDate, input.prices)
    return ok(c, { id }, 201)
  })

  routes.get('/prices/history', async (c) => {
    const limit = limitQuery(c)
    return ok(c, await services.prices.listPriceHistory(limit))
  })

  routes.post('/prices/quote', async (c) => {
    const baskets = await readBody(c, basketCountsSchema)
    return ok(c, await services.prices.quoteOrder(baskets))
  })

  return routes
}
