import { Hono } from 'hono'
import { recordFeedConsumptionSchema, recordPopulationSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

export function flockRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.post('/flock/population', async (c) => {
    const input = await readBody(c, recordPopulationSchema)
    const id = await services.flock.recordPopulation(input)
    return ok(c, { id }, 201)
  })

  routes.get('/flock/population', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.flock.listPopulation(from, to))
  })

  routes.get('/flock/population/current', async (c) => {
    return ok(c, await services.flock.getCurrentPopulation())
  })

  routes.post('/flock/feed', async (c) => {
    const input = await readBody(c, recordFeedConsumptionSchema)
    const id = await services.flock.recordFeedConsumption(input)
    return ok(c, { id }, 201)
  })

  routes.get('/flock/feed', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.flock.listFeedConsumption(from, to))
  })

  return routes
}
