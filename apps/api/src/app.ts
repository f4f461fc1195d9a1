/**
 * HTTP application.
 *
 * `createApp(store)` wires the services to the routes and maps the error
 * taxonomy onto the `{ success: false, error }` envelope. The store is
 * owned by the caller.
 */

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { FarmError, ReferentialError, StateError, ValidationError, type FarmStore } from '@layerfarm/db'
import { log } from './lib/log.js'
import { requestId } from './middleware/request-id.js'
import { coreApiRoutes } from './routes/core-api.js'
import { fail, ok, type FailureStatus } from './routes/_api.js'
import { createServices, type FarmServices } from './services/index.js'

export const API_VERSION = '0.1.0'

/** HTTP status for each error class. */
export function statusFor(error: FarmError): FailureStatus {
  if (error instanceof ValidationError) return 400
  if (error instanceof ReferentialError) return 404
  if (error instanceof StateError) return 409
  // ConsistencyViolation, StoreError
  return 500
}

export function createApp(store: FarmStore, services: FarmServices = createServices(store)) {
  const app = new Hono()

  app.use('/*', cors())
  app.use('/*', requestId)

  app.get('/health', (c) => {
    return ok(c, { service: 'layerfarm-api', status: 'healthy', version: API_VERSION })
  })

  app.route('/api/v1', coreApiRoutes(services))

  app.onError((err, c) => {
    if (err instanceof FarmError) {
      const status = statusFor(err)
      if (status >= 500) {
        log.error(`${c.req.method} ${c.req.path}: ${err.name}: ${err.message}`)
      } else {
        log.debug(`${c.req.method} ${c.req.path}: ${err.code} ${err.message}`)
      }
      return fail(c, err.code, err.message, status, err.context)
    }
    log.error(`${c.req.method} ${c.req.path}: ${err.message}`)
    return fail(c, 'INTERNAL_ERROR', 'Internal server error', 500)
  })

  app.notFound((c) => {
    return fail(c, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}`, 404)
  })

  return app
}

export type FarmApp = ReturnType<typeof createApp>
