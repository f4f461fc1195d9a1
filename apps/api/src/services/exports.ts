/**
 * CSV and spreadsheet exports for a date range.
 */

import * as XLSX from 'xlsx'
import type { FarmStore, FinancialMovement, ProductionRecord, Supply } from '@layerfarm/db'
import { EGG_CATEGORIES, EGG_CATEGORY_LABELS } from '@layerfarm/schema'
import { OrderService, type SaleEntry } from './orders.js'
import { PaymentService, type PaymentEntry } from './payments.js'
import { ProductionService } from './production.js'
import { PurchaseService } from './purchases.js'
import { ReportService } from './reports.js'

type Cell = string | number | boolean | null | undefined

export interface ExportColumn<T> {
  label: string
  value: (row: T) => Cell
}

export const EXPORT_DATASETS = ['production', 'sales', 'purchases', 'payments', 'movements'] as const
export type ExportDataset = (typeof EXPORT_DATASETS)[number]

export function isExportDataset(value: string): value is ExportDataset {
  return EXPORT_DATASETS.some((dataset) => dataset === value)
}

function csvCell(value: Cell): string {
  if (value === null || value === undefined) return ''
  const text = String(value)
  if (/[,"\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

/** Header row plus one line per row, `\n` separated, no trailing newline. */
export function toCsv<T>(rows: T[], columns: ExportColumn<T>[]): string {
  const header = columns.map((column) => csvCell(column.label)).join(',')
  const lines = rows.map((row) => columns.map((column) => csvCell(column.value(row))).join(','))
  return [header, ...lines].join('\n')
}

function toSheet<T>(rows: T[], columns: ExportColumn<T>[]) {
  const data: Cell[][] = [columns.map((column) => column.label)]
  for (const row of rows) {
    data.push(columns.map((column) => column.value(row) ?? ''))
  }
  return XLSX.utils.aoa_to_sheet(data)
}

/** One column per egg category, labelled `C`, `B` ... `Jumbo`. */
function categoryColumns<T extends Record<(typeof EGG_CATEGORIES)[number], number>>(): ExportColumn<T>[] {
  return EGG_CATEGORIES.map((category) => ({
    label: EGG_CATEGORY_LABELS[category],
    value: (row: T) => row[category],
  }))
}

const productionColumns: ExportColumn<ProductionRecord>[] = [
  { label: 'Date', value: (row) => row.date },
  { label: 'Time', value: (row) => row.time },
  ...categoryColumns<ProductionRecord>(),
  { label: 'Total', value: (row) => EGG_CATEGORIES.reduce((sum, category) => sum + row[category], 0) },
  { label: 'Note', value: (row) => row.note },
]

const saleColumns: ExportColumn<SaleEntry>[] = [
  { label: 'Dispatch date', value: (row) => row.dispatchDate },
  { label: 'Dispatch time', value: (row) => row.dispatchTime },
  { label: 'Order', value: (row) => row.orderId },
  { label: 'Client', value: (row) => row.clientName },
  ...categoryColumns<SaleEntry>(),
  { label: 'Baskets', value: (row) => row.totalBaskets },
  { label: 'Total price', value: (row) => row.totalPrice },
]

const purchaseColumns: ExportColumn<Supply>[] = [
  { label: 'Date', value: (row) => row.purchaseDate },
  { label: 'Item', value: (row) => row.name },
  { label: 'Category', value: (row) => row.category },
  { label: 'Quantity', value: (row) => row.quantity },
  { label: 'Unit', value: (row) => row.unit },
  { label: 'Unit cost', value: (row) => row.unitCost },
  { label: 'Total cost', value: (row) => row.totalCost },
  { label: 'Supplier', value: (row) => row.supplier },
]

const paymentColumns: ExportColumn<PaymentEntry>[] = [
  { label: 'Date', value: (row) => row.date },
  { label: 'Time', value: (row) => row.time },
  { label: 'Worker', value: (row) => row.workerName },
  { label: 'Role', value: (row) => row.workerRole },
  { label: 'Amount', value: (row) => row.amount },
  { label: 'Concept', value: (row) => row.concept },
]

const movementColumns: ExportColumn<FinancialMovement>[] = [
  { label: 'Date', value: (row) => row.date },
  { label: 'Type', value: (row) => row.type },
  { label: 'Category', value: (row) => row.category },
  { label: 'Amount', value: (row) => row.amount },
  { label: 'Description', value: (row) => row.description },
]

export class ExportService {
  private readonly production: ProductionService
  private readonly orders: OrderService
  private readonly purchases: PurchaseService
  private readonly payments: PaymentService
  private readonly reports: ReportService

  constructor(store: FarmStore) {
    this.production = new ProductionService(store)
    this.orders = new OrderService(store)
    this.purchases = new PurchaseService(store)
    this.payments = new PaymentService(store)
    this.reports = new ReportService(store)
  }

  async exportCsv(dataset: ExportDataset, from: string, to: string): Promise<string> {
    switch (dataset) {
      case 'production':
        return toCsv(await this.production.listByRange(from, to), productionColumns)
      case 'sales':
        return toCsv(await this.orders.listSalesHistory(from, to), saleColumns)
      case 'purchases':
        return toCsv(await this.purchases.listPurchases(from, to), purchaseColumns)
      case 'payments':
        return toCsv(await this.payments.listPayments(from, to), paymentColumns)
      case 'movements':
        return toCsv(await this.reports.listMovements(from, to), movementColumns)
    }
  }

  /** Workbook with `Summary`, `Production`, `Sales` and `Movements` sheets. */
  async exportWorkbook(from: string, to: string): Promise<ArrayBuffer> {
    const [summary, production, sales, movements] = await Promise.all([
      this.reports.dashboardSummary(from, to),
      this.production.listByRange(from, to),
      this.orders.listSalesHistory(from, to),
      this.reports.listMovements(from, to),
    ])

    const kpis = summary.current
    const summaryRows: Cell[][] = [
      ['Indicator', 'Value'],
      ['From', from],
      ['To', to],
      ['Total income', kpis.income],
      ['Total expense', kpis.expense],
      ['Balance', kpis.balance],
      ['Margin %', Number(kpis.marginPct.toFixed(2))],
      ['Eggs produced', kpis.produced],
      ['Eggs sold', kpis.sold],
      ['Sell-through %', Number(kpis.sellThroughPct.toFixed(2))],
    ]

    const workbook = XLSX.utils.book_new()
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(summaryRows), 'Summary')
    XLSX.utils.book_append_sheet(workbook, toSheet(production, productionColumns), 'Production')
    XLSX.utils.book_append_sheet(workbook, toSheet(sales, saleColumns), 'Sales')
    XLSX.utils.book_append_sheet(workbook, toSheet(movements, movementColumns), 'Movements')

    const written: unknown = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' })
    if (!(written instanceof ArrayBuffer)) {
      throw new Error('Spreadsheet writer did not return an ArrayBuffer')
    }
    return written
  }
}
