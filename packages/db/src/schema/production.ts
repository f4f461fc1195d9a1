import { index, pgTable, text } from "drizzle-orm/pg-core";
import {
  createdAt,
  eggCategoryColumns,
  idRef,
  idWithTag,
  updatedAt,
  withEventMoment,
} from "./_common";
import { adjustmentKindEnum } from "./enums";

/** Primary key of the single `egg_stock` row seeded by `sql/schema.sql`. */
export const EGG_STOCK_ID = "egg_stock";

/**
 * production_records
 *
 * One row per collection event. Counts are eggs (not baskets) per category.
 * Inserting a row adds its counts to `egg_stock`.
 */
export const productionRecords = pgTable(
  "production_records",
  {
    id: idWithTag("production"),
    ...withEventMoment(),
    ...eggCategoryColumns("type"),
    note: text("note"),
    createdAt: createdAt(),
  },
  (table) => ({
    productionRecordsDateIdx: index("production_records_date_idx").on(table.date),
  }),
);

/**
 * egg_stock
 *
 * Singleton running totals per category. Written only by the derived-state
 * rules (production, dispatch, adjustment); `date`/`time` track the latest
 * production event. Totals may go negative: dispatches are not checked
 * against stock.
 */
export const eggStock = pgTable("egg_stock", {
  id: idRef("id").primaryKey(),
  ...withEventMoment(),
  ...eggCategoryColumns("type"),
  updatedAt: updatedAt(),
});

/**
 * egg_stock_adjustments
 *
 * Append-only audit of manual stock changes. Deltas are stored with the sign
 * that was applied to `egg_stock`.
 */
export const eggStockAdjustments = pgTable(
  "egg_stock_adjustments",
  {
    id: idWithTag("egg_adjustment"),
    ...withEventMoment(),
    kind: adjustmentKindEnum("kind").notNull(),
    ...eggCategoryColumns("type"),
    reason: text("reason"),
    createdAt: createdAt(),
  },
  (table) => ({
    eggStockAdjustmentsDateIdx: index("egg_stock_adjustments_date_idx").on(table.date),
  }),
);
