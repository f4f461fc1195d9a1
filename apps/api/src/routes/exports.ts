/**
 * File exports: `/exports/<dataset>.csv` and `/exports/report.xlsx`.
 */

import { Hono } from 'hono'
import { isExportDataset } from '../services/exports.js'
import type { FarmServices } from '../services/index.js'
import { fail, rangeQuery } from './_api.js'

const XLSX_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

const attachment = (name: string) => `attachment; filename="${name}"`

export function exportRoutes(services: FarmServices) {
  const routes = new Hono()

  routes.get('/exports/:file', async (c) => {
    const file = c.req.param('file')
    const { from, to } = rangeQuery(c)

    if (file === 'report.xlsx') {
      const workbook = await services.exports.exportWorkbook(from, to)
      return c.body(workbook, 200, {
        'Content-Type': XLSX_TYPE,
        'Content-Disposition': attachment(`report_${from}_${to}.xlsx`),
      })
    }

    const dataset = file.endsWith('.csv') ? file.slice(0, -'.csv'.length) : ''
    if (!isExportDataset(dataset)) {
      return fail(c, 'NOT_FOUND', `Unknown export: ${file}`, 404)
    }

    const csv = await services.exports.exportCsv(dataset, from, to)
    return c.body(csv, 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': attachment(`${dataset}_${from}_${to}.csv`),
    })
  })

  return routes
}
