import { boolean, date, doublePrecision, index, pgTable } from "drizzle-orm/pg-core";
import { createdAt, idWithTag } from "./_common";

/**
 * price_schedules
 *
 * Unit price per egg category. At most one row is active; creating a
 * schedule deactivates every other row in the same transaction.
 */
export const priceSchedules = pgTable(
  "price_schedules",
  {
    id: idWithTag("price"),
    effectiveDate: date("effective_date", { mode: "string" }).notNull(),
    priceC: doublePrecision("price_c").notNull(),
    priceB: doublePrecision("price_b").notNull(),
    priceA: doublePrecision("price_a").notNull(),
    priceAa: doublePrecision("price_aa").notNull(),
    priceAaa: doublePrecision("price_aaa").notNull(),
    priceJumbo: doublePrecision("price_jumbo").notNull(),
    active: boolean("active").default(true).notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    priceSchedulesActiveIdx: index("price_schedules_active_idx").on(table.active),
  }),
);
