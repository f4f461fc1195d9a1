/**
 * Report routes. Every report takes `?from&to`; empty periods return zeros.
 */

import { Hono } from 'hono'
import type { FarmServices } from '../services/index.js'
import { limitQuery, ok, rangeQuery } from './_api.js'

export function reportRoutes(services: FarmServices) {
  const routes = new Hono()
  const reports = services.reports

  routes.get('/reports/balance', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.balance(from, to))
  })

  routes.get('/reports/movements', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.listMovements(from, to))
  })

  routes.get('/reports/movements/by-category', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.movementsByCategory(from, to))
  })

  routes.get('/reports/production-vs-sales', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.productionVsSales(from, to))
  })

  routes.get('/reports/daily-production', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.dailyProduction(from, to))
  })

  routes.get('/reports/daily-sales', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.dailySales(from, to))
  })

  routes.get('/reports/top-clients', async (c) => {
    const { from, to } = rangeQuery(c)
    const limit = limitQuery(c)
    return ok(c, await reports.topClients(from, to, limit))
  })

  routes.get('/reports/sales-by-category', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.salesByCategory(from, to))
  })

  routes.get('/reports/cost-per-egg', async (c) => {
    const { from, to } = rangeQuery(c)
    return ok(c, await reports.costPerEgg(from, to))
  })

  routes.get('/reports/stock', async (c) => {
    return ok(c, await reports.stockStatistics())
  })

  routes.get('/reports/dashboard', async (c) => {
    const { from, to } = rangeQuery(c)
    const compare = c.req.query('compare') === 'true'
    return ok(c, await reports.dashboardSummary(from, to, { compare }))
  })

  return routes
}
