/**
 * Canonical API router, mounted at /api/v1.
 *
 * Route modules are split by domain and share one set of services.
 */

import { Hono } from 'hono'
import type { FarmServices } from '../services/index.js'
import { clientRoutes } from './clients.js'
import { exportRoutes } from './exports.js'
import { flockRoutes } from './flock.js'
import { orderRoutes } from './orders.js'
import { paymentRoutes } from './payments.js'
import { priceRoutes } from './prices.js'
import { productionRoutes } from './production.js'
import { purchaseRoutes } from './purchases.js'
import { reportRoutes } from './reports.js'
import { stockRoutes } from './stock.js'
import { workerRoutes } from './workers.js'

export function coreApiRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.route('/', productionRoutes(services))
  routes.route('/', stockRoutes(services))
  routes.route('/', clientRoutes(services))
  routes.route('/', workerRoutes(services))
  routes.route('/', priceRoutes(services))
  routes.route('/', orderRoutes(services))
  routes.route('/', purchaseRoutes(services))
  routes.route('/', paymentRoutes(services))
  routes.route('/', flockRoutes(services))
  routes.route('/', reportRoutes(services))
  routes.route('/', exportRoutes(services))

  return routes
}
