import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { eq } from 'drizzle-orm'
import { ReferentialError, StateError, financialMovements } from '@layerfarm/db'
import { failureOf, openTestFarm, type TestFarm } from './fixtures'

describe('payments.ts', () => {
  let farm: TestFarm
  let workerId: string

  beforeEach(async () => {
    farm = await openTestFarm()
    workerId = await farm.services.workers.createWorker({ name: 'Luis Pardo', role: 'collector' })
  })

  afterEach(async () => {
    await farm.store.close()
  })

  it('should book each payment as a worker payment expense', async () => {
    const paymentId = await farm.services.payments.registerWorkerPayment({
      workerId,
      date: '2026-03-07',
      time: '18:00:00',
      amount: 200,
      concept: 'weekly wage',
    })

    const [movement] = await farm.store.db
      .select()
      .from(financialMovements)
      .where(eq(financialMovements.referenceId, paymentId))
    expect(movement).toMatchObject({
      date: '2026-03-07',
      type: 'expense',
      category: 'worker payment',
      amount: 200,
      description: 'Payment to Luis Pardo - weekly wage',
      referenceTable: 'worker_payments',
    })
  })

  it('should describe a payment without concept', async () => {
    const paymentId = await farm.services.payments.registerWorkerPayment({
      workerId,
      date: '2026-03-07',
      time: '18:00:00',
      amount: 50,
    })

    const [movement] = await farm.store.db
      .select()
      .from(financialMovements)
      .where(eq(financialMovements.referenceId, paymentId))
    expect(movement.description).toBe('Payment to Luis Pardo - no concept')
  })

  it('should reject an unknown worker', async () => {
    const error = await failureOf(
      farm.services.payments.registerWorkerPayment({
        workerId: 'worker_missing',
        date: '2026-03-07',
        time: '18:00:00',
        amount: 50,
      }),
      ReferentialError,
    )
    expect(error.context).toEqual({ entity: 'Worker', id: 'worker_missing' })
  })

  it('should reject a deactivated worker', async () => {
    await farm.services.workers.deactivateWorker(workerId)
    await failureOf(
      farm.services.payments.registerWorkerPayment({ workerId, date: '2026-03-07', time: '18:00:00', amount: 50 }),
      StateError,
    )
  })

  it('should list payments with worker details and total them per worker', async () => {
    const { payments, workers } = farm.services
    const otherId = await workers.createWorker({ name: 'Marta Gil' })
    await payments.registerWorkerPayment({ workerId, date: '2026-03-07', time: '18:00:00', amount: 200 })
    await payments.registerWorkerPayment({ workerId, date: '2026-03-14', time: '18:00:00', amount: 150.5 })
    await payments.registerWorkerPayment({ workerId: otherId, date: '2026-03-14', time: '19:00:00', amount: 80 })

    const listed = await payments.listPayments('2026-03-01', '2026-03-31')
    expect(listed.map((payment) => [payment.workerName, payment.amount])).toEqual([
      ['Marta Gil', 80],
      ['Luis Pardo', 150.5],
      ['Luis Pardo', 200],
    ])
    expect(listed[1].workerRole).toBe('collector')

    expect(await payments.listPaymentsForWorker(workerId, '2026-03-01', '2026-03-10')).toHaveLength(1)
    expect(await payments.totalPaidToWorker(workerId, '2026-03-01', '2026-03-31')).toBe(350.5)
    expect(await payments.totalPaidToWorker(workerId, '2026-04-01', '2026-04-30')).toBe(0)
  })
})
