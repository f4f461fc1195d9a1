/**
 * Response envelopes and request readers shared by every router.
 *
 * Success: `{ success: true, data, meta, ...extra }`.
 * Failure: `{ success: false, error: { code, message, details? }, meta }`.
 */

import type { Context } from 'hono'
import type { z } from 'zod'
import { ValidationError } from '@layerfarm/db'
import { dateRangeSchema, type DateRange } from '@layerfarm/schema'
import { parseInput } from '../services/validation.js'

export type SuccessStatus = 200 | 201
export type FailureStatus = 400 | 404 | 409 | 500

export type EnvelopeMeta = { requestId: string; timestamp: string }

function envelopeMeta(c: Context): EnvelopeMeta {
  return { requestId: c.get('requestId'), timestamp: new Date().toISOString() }
}

/** `extra` keys sit beside `data`, e.g. a `total` for a listed range. */
export function ok<T>(c: Context, data: T, status: SuccessStatus = 200, extra: Record<string, unknown> = {}) {
  return c.json({ success: true, data, meta: envelopeMeta(c), ...extra }, status)
}

export function fail(c: Context, code: string, message: string, status: FailureStatus, details?: unknown) {
  const error = details === undefined ? { code, message } : { code, message, details }
  return c.json({ success: false, error, meta: envelopeMeta(c) }, status)
}

/** `?limit=` clamped to `1..max`; anything unparsable falls back. */
export function limitQuery(c: Context, fallback = 10, max = 100): number {
  const parsed = Number(c.req.query('limit'))
  if (!Number.isFinite(parsed) || parsed < 1) {
    return fallback
  }
  return Math.min(Math.floor(parsed), max)
}

/** `?from=YYYY-MM-DD&to=YYYY-MM-DD`, both required. */
export function rangeQuery(c: Context): DateRange {
  return parseInput(dateRangeSchema, c.req.query())
}

/** Reads the JSON body and validates it against `schema`; unparsable JSON fails on `body`. */
export async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new ValidationError('Invalid body: expected a JSON document', { field: 'body' })
  }
  return parseInput(schema, body)
}
