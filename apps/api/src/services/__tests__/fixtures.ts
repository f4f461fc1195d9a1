import { FarmError, openStore, type FarmStore } from '@layerfarm/db'
import { createServices, type FarmServices } from '../index'

export type TestFarm = {
  store: FarmStore
  services: FarmServices
}

/** Fresh in-memory store with the schema applied. */
export async function openTestFarm(): Promise<TestFarm> {
  const store = await openStore()
  return { store, services: createServices(store) }
}

/** Awaits `promise` and returns the `type` error it rejects with. */
export async function failureOf<E extends FarmError>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise
  } catch (error) {
    if (error instanceof type) return error
    throw error
  }
  throw new Error(`Expected ${type.name} to be thrown`)
}

export const ALL_TIME = { from: '2000-01-01', to: '2999-12-31' }
