/**
 * Production routes: collection events and their totals.
 */

import { Hono } from 'hono'
import { recordProductionSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

export function productionRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.post('/production', async (c) => {
    const input = await readBody(c, recordProductionSchema)
    const id = await services.production.recordProduction(input)
    return ok(c, { id }, 201)
  })

  routes.get('/production', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.production.listByRange(from, to))
  })

  routes.get('/production/totals', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.production.totalsForRange(from, to))
  })

  routes.get('/production/days/:date', async (c) => {
    return ok(c, await services.production.listForDay(c.req.param('date')))
  })

  return routes
}
