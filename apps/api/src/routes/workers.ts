/**
 * Worker routes. Deleting a worker deactivates it; payments are under
 * /payments.
 */

import { Hono } from 'hono'
import { createWorkerSchema, updateWorkerSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, readBody } from './_api.js'

export function workerRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.get('/workers', async (c) => {
    return ok(c, await services.workers.listActiveWorkers())
  })

  routes.post('/workers', async (c) => {
    const input = await readBody(c, createWorkerSchema)
    const id = await services.workers.createWorker(input)
    return ok(c, { id }, 201)
  })

  routes.get('/workers/:id', async (c) => {
    return ok(c, await services.workers.getWorker(c.req.param('id')))
  })

  routes.put('/workers/:id', async (c) => {
    const input = await readBody(c, updateWorkerSchema)
    return ok(c, await services.workers.updateWorker(c.req.param('id'), input))
  })

  routes.delete('/workers/:id', async (c) => {
    const id = c.req.param('id')
    await services.workers.deactivateWorker(id)
    return ok(c, { id, active: false })
  })

  return routes
}
