import { and, desc, eq, gte, lte } from 'drizzle-orm'
import {
  ReferentialErrors,
  StateErrors,
  workerPayments,
  workers,
  type FarmStore,
  type WorkerPayment,
} from '@layerfarm/db'
import { workerPaymentSchema, type WorkerPaymentInput } from '@layerfarm/schema'
import { applyWorkerPayment } from './derived-state.js'
import { sumOf } from './_sql.js'
import { parseInput, parseRange } from './validation.js'

export type PaymentEntry = WorkerPayment & { workerName: string; workerRole: string | null }

export class PaymentService {
  constructor(private readonly store: FarmStore) {}

  async registerWorkerPayment(input: WorkerPaymentInput): Promise<string> {
    const data = parseInput(workerPaymentSchema, input)

    return this.store.transaction(async (tx) => {
      const worker = await tx.query.workers.findFirst({ where: eq(workers.id, data.workerId) })
      if (!worker) {
        throw ReferentialErrors.WORKER_NOT_FOUND(data.workerId)
      }
      if (!worker.active) {
        throw StateErrors.WORKER_INACTIVE(worker.id)
      }

      const [payment] = await tx
        .insert(workerPayments)
        .values({
          workerId: worker.id,
          date: data.date,
          time: data.time,
          amount: data.amount,
          concept: data.concept ?? null,
        })
        .returning()
      await applyWorkerPayment(tx, payment, worker.name)
      return payment.id
    })
  }

  async listPayments(from: string, to: string): Promise<PaymentEntry[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select({
        id: workerPayments.id,
        workerId: workerPayments.workerId,
        date: workerPayments.date,
        time: workerPayments.time,
        amount: workerPayments.amount,
        concept: workerPayments.concept,
        createdAt: workerPayments.createdAt,
        workerName: workers.name,
        workerRole: workers.role,
      })
      .from(workerPayments)
      .innerJoin(workers, eq(workerPayments.workerId, workers.id))
      .where(and(gte(workerPayments.date, range.from), lte(workerPayments.date, range.to)))
      .orderBy(desc(workerPayments.date), desc(workerPayments.time))
  }

  async listPaymentsForWorker(workerId: string, from: string, to: string): Promise<WorkerPayment[]> {
    const range = parseRange(from, to)
    return this.store.db
      .select()
      .from(workerPayments)
      .where(
        and(
          eq(workerPayments.workerId, workerId),
          gte(workerPayments.date, range.from),
          lte(workerPayments.date, range.to),
        ),
      )
      .orderBy(desc(workerPayments.date), desc(workerPayments.time))
  }

  async totalPaidToWorker(workerId: string, from: string, to: string): Promise<number> {
    const range = parseRange(from, to)
    const [row] = await this.store.db
      .select({ total: sumOf(workerPayments.amount) })
      .from(workerPayments)
      .where(
        and(
          eq(workerPayments.workerId, workerId),
          gte(workerPayments.date, range.from),
          lte(workerPayments.date, range.to),
        ),
      )
    return row.total
  }
}
