/**
 * Worker payment routes.
 */

import { Hono } from 'hono'
import { workerPaymentSchema } from '@layerfarm/schema'
import type { FarmServices } from '../services/index.js'
import { ok, rangeQuery, readBody } from './_api.js'

export function paymentRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.post('/payments', async (c) => {
    const input = await readBody(c, workerPaymentSchema)
    const id = await services.payments.registerWorkerPayment(input)
    return ok(c, { id }, 201)
  })

  routes.get('/payments', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await services.payments.listPayments(from, to))
  })

  routes.get('/payments/workers/:workerId', async (c) => {
    const { from, to } = rangeQuery(c)
    const workerId = c.req.param('workerId')
    const [payments, total] = await Promise.all([
      services.payments.listPaymentsForWorker(workerId, from, to),
      services.payments.totalPaidToWorker(workerId, from, to),
    ])
    return ok(c, payments, 200, { total })
  })

  return routes
}
