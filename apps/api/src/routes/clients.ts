/**
 * Client routes. Deleting a client deactivates it.
 */

import { Hono } from 'hono'
import { createClientSchema, updateClientSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, readBody } from './_api.js'

export function clientRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.get('/clients', async (c) => {
    return ok(c, await services.clients.listActiveClients())
  })

  routes.post('/clients', async (c) => {
    const input = await readBody(c, createClientSchema)
    const id = await services.clients.createClient(input)
    return ok(c, { id }, 201)
  })

  routes.get('/clients/:id', async (c) => {
    return ok(c, await services.clients.getClient(c.req.param('id')))
  })

  routes.put('/clients/:id', async (c) => {
    const input = await readBody(c, updateClientSchema)
    return ok(c, await services.clients.updateClient(c.req.param('id'), input))
  })

  routes.delete('/clients/:id', async (c) => {
    const id = c.req.param('id')
    await services.clients.deactivateClient(id)
    return ok(c, { id, active: false })
  })

  routes.get('/clients/:id/orders', async (c) => {
    return ok(c, await services.clients.getClientHistory(c.req.param('id')))
  })

  return routes
}
