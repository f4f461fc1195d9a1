import { date, integer, text, time, timestamp } from "drizzle-orm/pg-core";
import { generateId } from "../id";

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () =>
  timestamp("created_at", { withTimezone: true }).defaultNow().notNull();

/** Last update timestamp (application refreshes it on mutation). */
export const updatedAt = () =>
  timestamp("updated_at", { withTimezone: true }).defaultNow().notNull();

/** Text FK helper for tagged KSUID ids. */
export const idRef = (name: string) => text(name);

/** Primary key helper using tagged KSUID generation. */
export const idWithTag = (tag = "") =>
  idRef("id").primaryKey().$defaultFn(() => generateId(tag));

/** Calendar date + wall-clock time of the event, both kept as strings. */
export const withEventMoment = () => ({
  date: date("date", { mode: "string" }).notNull(),
  time: time("time").notNull(),
});

/**
 * One integer column per egg category.
 *
 * `prefix` names the physical columns (`type_c`, `baskets_jumbo`, ...) while
 * the TypeScript keys stay the bare category so rows line up with
 * `EggCounts` from @layerfarm/schema.
 */
export const eggCategoryColumns = (prefix: string) => ({
  c: integer(`${prefix}_c`).default(0).notNull(),
  b: integer(`${prefix}_b`).default(0).notNull(),
  a: integer(`${prefix}_a`).default(0).notNull(),
  aa: integer(`${prefix}_aa`).default(0).notNull(),
  aaa: integer(`${prefix}_aaa`).default(0).notNull(),
  jumbo: integer(`${prefix}_jumbo`).default(0).notNull(),
});
