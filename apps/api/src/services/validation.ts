import type { z } from 'zod'
import { ValidationError } from '@layerfarm/db'
import { dateRangeSchema, type DateRange } from '@layerfarm/schema'

/**
 * Parses caller input with a zod schema. The first failing issue becomes a
 * `ValidationError` whose `field` is the dotted path (`counts.c`).
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input)
  if (parsed.success) {
    return parsed.data
  }
  const issue = parsed.error.issues[0]
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input'
  throw new ValidationError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, {
    field,
    issues: parsed.error.flatten(),
  })
}

export function parseRange(from: string, to: string): DateRange {
  return parseInput(dateRangeSchema, { from, to })
}
