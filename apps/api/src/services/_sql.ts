import { sql, type AnyColumn, type SQL } from 'drizzle-orm'
import type { EggCounts } from '@layerfarm/schema'

/** `coalesce(sum(x), 0)` read back as a JS number. */
export const sumOf = (value: AnyColumn | SQL) => sql<number>`coalesce(sum(${value}), 0)`.mapWith(Number)

export const countRows = () => sql<number>`count(*)`.mapWith(Number)

type CategoryColumns = Record<keyof EggCounts, AnyColumn>

/** `c + b + a + aa + aaa + jumbo` over one row. */
export const rowTotal = (table: CategoryColumns) =>
  sql<number>`(${table.c} + ${table.b} + ${table.a} + ${table.aa} + ${table.aaa} + ${table.jumbo})`

/** Per-category sums, zeroed when no row matches. */
export const categorySums = (table: CategoryColumns) => ({
  c: sumOf(table.c),
  b: sumOf(table.b),
  a: sumOf(table.a),
  aa: sumOf(table.aa),
  aaa: sumOf(table.aaa),
  jumbo: sumOf(table.jumbo),
})

/** Copies the six category fields out of a wider row. */
export function pickCounts(row: EggCounts): EggCounts {
  return { c: row.c, b: row.b, a: row.a, aa: row.aa, aaa: row.aaa, jumbo: row.jumbo }
}
