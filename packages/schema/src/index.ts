import { z } from 'zod'

// Vocabularies
export const EGG_CATEGORIES = ['c', 'b', 'a', 'aa', 'aaa', 'jumbo'] as const
export type EggCategory = (typeof EGG_CATEGORIES)[number]

export const EGG_CATEGORY_LABELS: Record<EggCategory, string> = {
  c: 'C',
  b: 'B',
  a: 'A',
  aa: 'AA',
  aaa: 'AAA',
  jumbo: 'Jumbo',
}

/** One basket (canastilla) always holds 30 eggs. */
export const EGGS_PER_BASKET = 30

export const SUPPLY_CATEGORIES = ['feed', 'medicine', 'maintenance', 'baskets', 'other'] as const
export type SupplyCategory = (typeof SUPPLY_CATEGORIES)[number]

export const SUPPLY_UNITS = ['kg', 'sacks', 'litres', 'units'] as const
export type SupplyUnit = (typeof SUPPLY_UNITS)[number]

export const ORDER_STATUSES = ['pending', 'completed', 'cancelled'] as const
export type OrderStatus = (typeof ORDER_STATUSES)[number]

export const ADJUSTMENT_KINDS = ['loss', 'correction'] as const
export type AdjustmentKind = (typeof ADJUSTMENT_KINDS)[number]

export const SUPPLY_MOVEMENT_KINDS = ['in', 'out'] as const
export type SupplyMovementKind = (typeof SUPPLY_MOVEMENT_KINDS)[number]

export const MOVEMENT_TYPES = ['income', 'expense'] as const
export type MovementType = (typeof MOVEMENT_TYPES)[number]

export type EggCounts = Record<EggCategory, number>

export function zeroCounts(): EggCounts {
  return { c: 0, b: 0, a: 0, aa: 0, aaa: 0, jumbo: 0 }
}

export function sumCounts(counts: EggCounts): number {
  return EGG_CATEGORIES.reduce((sum, category) => sum + counts[category], 0)
}

// Dates and times
const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/
const clockTimePattern = /^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/

export const dateSchema = z
  .string()
  .regex(isoDatePattern, 'Expected a date as YYYY-MM-DD')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`)
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value
  }, 'Not a calendar date')

export const timeSchema = z.string().regex(clockTimePattern, 'Expected a time as HH:MM:SS')

export const dateRangeSchema = z
  .object({
    from: dateSchema,
    to: dateSchema,
  })
  .refine((range) => range.from <= range.to, {
    message: '`from` must not be after `to`',
    path: ['to'],
  })

const pad = (value: number) => String(value).padStart(2, '0')

/** Local calendar date, `YYYY-MM-DD`. */
export function currentDate(now = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`
}

/** Local wall-clock time, `HH:MM:SS`. */
export function currentTime(now = new Date()): string {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
}

// Shared field shapes
const note = z.string().trim().max(500).optional()
const name = z.string().trim().min(1).max(120)
// Counts are stored in 32-bit integer columns.
export const MAX_EGG_COUNT = 2_147_483_647
export const MAX_BASKET_COUNT = Math.floor(MAX_EGG_COUNT / EGGS_PER_BASKET)

const eggCount = z.number().int().min(0).max(MAX_EGG_COUNT).default(0)
const signedEggCount = z.number().int().min(-MAX_EGG_COUNT).max(MAX_EGG_COUNT).default(0)
const basketCount = z.number().int().min(0).max(MAX_BASKET_COUNT).default(0)

export const eggCountsSchema = z.object({
  c: eggCount,
  b: eggCount,
  a: eggCount,
  aa: eggCount,
  aaa: eggCount,
  jumbo: eggCount,
})

export const signedEggCountsSchema = z.object({
  c: signedEggCount,
  b: signedEggCount,
  a: signedEggCount,
  aa: signedEggCount,
  aaa: signedEggCount,
  jumbo: signedEggCount,
})

export const basketCountsSchema = z.object({
  c: basketCount,
  b: basketCount,
  a: basketCount,
  aa: basketCount,
  aaa: basketCount,
  jumbo: basketCount,
})

const positivePrice = z.number().positive()

export const unitPricesSchema = z.object({
  c: positivePrice,
  b: positivePrice,
  a: positivePrice,
  aa: positivePrice,
  aaa: positivePrice,
  jumbo: positivePrice,
})

// Production + egg stock
export const recordProductionSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  counts: eggCountsSchema,
  note,
})

export const adjustEggStockSchema = z.object({
  kind: z.enum(ADJUSTMENT_KINDS),
  deltas: signedEggCountsSchema,
  reason: note,
  date: dateSchema.optional(),
  time: timeSchema.optional(),
})

// Clients + workers
export const createClientSchema = z.object({
  name,
  contact: z.string().trim().max(120).optional(),
})

export const updateClientSchema = createClientSchema

export const createWorkerSchema = z.object({
  name,
  role: z.string().trim().max(80).optional(),
})

export const updateWorkerSchema = createWorkerSchema

// Prices
export const createPriceScheduleSchema = z.object({
  effectiveDate: dateSchema,
  prices: unitPricesSchema,
})

// Orders + dispatches
export const createOrderSchema = z.object({
  clientId: z.string().min(1),
  date: dateSchema,
  time: timeSchema,
  baskets: basketCountsSchema,
  totalPrice: z.number().min(0),
  note,
})

export const updateOrderSchema = z.object({
  baskets: basketCountsSchema,
  totalPrice: z.number().min(0),
  note,
})

export const dispatchOrderSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  baskets: basketCountsSchema,
  note,
})

// Supplies
export const supplyPurchaseSchema = z.object({
  name,
  category: z.enum(SUPPLY_CATEGORIES),
  unit: z.enum(SUPPLY_UNITS),
  quantity: z.number().positive(),
  unitCost: z.number().min(0),
  totalCost: z.number().min(0),
  purchaseDate: dateSchema,
  supplier: z.string().trim().max(120).optional(),
})

export const supplyMovementSchema = z.object({
  supplyStockId: z.string().min(1),
  quantity: z.number().positive(),
  reason: note,
  date: dateSchema.optional(),
  time: timeSchema.optional(),
})

export const setSupplyQuantitySchema = z.object({
  quantity: z.number().min(0),
  reason: note,
})

export const setMinimumQuantitySchema = z.object({
  minimum: z.number().min(0),
})

// Worker payments
export const workerPaymentSchema = z.object({
  workerId: z.string().min(1),
  date: dateSchema,
  time: timeSchema,
  amount: z.number().positive(),
  concept: note,
})

// Flock
export const recordPopulationSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  totalCount: z.number().int().min(0),
  discards: z.number().int().min(0).default(0),
  note,
})

export const recordFeedConsumptionSchema = z.object({
  date: dateSchema,
  time: timeSchema,
  perBirdGrams: z.number().positive(),
  birdCount: z.number().int().min(0),
  note,
})

export type DateRange = z.infer<typeof dateRangeSchema>
export type RecordProductionInput = z.input<typeof recordProductionSchema>
export type AdjustEggStockInput = z.input<typeof adjustEggStockSchema>
export type CreateClientInput = z.input<typeof createClientSchema>
export type CreateWorkerInput = z.input<typeof createWorkerSchema>
export type CreatePriceScheduleInput = z.input<typeof createPriceScheduleSchema>
export type CreateOrderInput = z.input<typeof createOrderSchema>
export type UpdateOrderInput = z.input<typeof updateOrderSchema>
export type DispatchOrderInput = z.input<typeof dispatchOrderSchema>
export type SupplyPurchaseInput = z.input<typeof supplyPurchaseSchema>
export type SupplyMovementInput = z.input<typeof supplyMovementSchema>
export type WorkerPaymentInput = z.input<typeof workerPaymentSchema>
export type RecordPopulationInput = z.input<typeof recordPopulationSchema>
export type RecordFeedConsumptionInput = z.input<typeof recordFeedConsumptionSchema>
