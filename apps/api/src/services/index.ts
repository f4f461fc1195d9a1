import type { FarmStore } from '@layerfarm/db'
import { ClientService } from './clients.js'
import { ExportService } from './exports.js'
import { FlockService } from './flock.js'
import { OrderService } from './orders.js'
import { PaymentService } from './payments.js'
import { PriceService } from './prices.js'
import { ProductionService } from './production.js'
import { PurchaseService } from './purchases.js'
import { ReportService } from './reports.js'
import { StockService } from './stock.js'
import { WorkerService } from './workers.js'

export type FarmServices = {
  production: ProductionService
  stock: StockService
  clients: ClientService
  workers: WorkerService
  prices: PriceService
  orders: OrderService
  purchases: PurchaseService
  payments: PaymentService
  flock: FlockService
  reports: ReportService
  exports: ExportService
}

/** One instance of every service, all bound to the same store. */
export function createServices(store: FarmStore): FarmServices {
  return {
    production: new ProductionService(store),
    stock: new StockService(store),
    clients: new ClientService(store),
    workers: new WorkerService(store),
    prices: new PriceService(store),
    orders: new OrderService(store),
    purchases: new PurchaseService(store),
    payments: new PaymentService(store),
    flock: new FlockService(store),
    reports: new ReportService(store),
    exports: new ExportService(store),
  }
}
