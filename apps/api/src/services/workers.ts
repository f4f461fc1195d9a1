import { asc, eq } from 'drizzle-orm'
import { ReferentialErrors, workers, type FarmStore, type Worker } from '@layerfarm/db'
import { createWorkerSchema, updateWorkerSchema, type CreateWorkerInput } from '@layerfarm/schema'
import { parseInput } from './validation.js'

export class WorkerService {
  constructor(private readonly store: FarmStore) {}

  async createWorker(input: CreateWorkerInput): Promise<string> {
    const data = parseInput(createWorkerSchema, input)
    const [worker] = await this.store.db
      .insert(workers)
      .values({ name: data.name, role: data.role ?? null })
      .returning({ id: workers.id })
    return worker.id
  }

  listActiveWorkers(): Promise<Worker[]> {
    return this.store.db.select().from(workers).where(eq(workers.active, true)).orderBy(asc(workers.name))
  }

  async getWorker(id: string): Promise<Worker> {
    const worker = await this.store.db.query.workers.findFirst({ where: eq(workers.id, id) })
    if (!worker) {
      throw ReferentialErrors.WORKER_NOT_FOUND(id)
    }
    return worker
  }

  async updateWorker(id: string, input: CreateWorkerInput): Promise<Worker> {
    const data = parseInput(updateWorkerSchema, input)
    const [updated] = await this.store.db
      .update(workers)
      .set({ name: data.name, role: data.role ?? null })
      .where(eq(workers.id, id))
      .returning()
    if (!updated) {
      throw ReferentialErrors.WORKER_NOT_FOUND(id)
    }
    return updated
  }

  async deactivateWorker(id: string): Promise<void> {
    const [updated] = await this.store.db
      .update(workers)
      .set({ active: false })
      .where(eq(workers.id, id))
      .returning({ id: workers.id })
    if (!updated) {
      throw ReferentialErrors.WORKER_NOT_FOUND(id)
    }
  }
}
