import { date, doublePrecision, index, pgTable, text, varchar } from "drizzle-orm/pg-core";
import { createdAt, idRef, idWithTag, updatedAt, withEventMoment } from "./_common";
import { supplyCategoryEnum, supplyMovementKindEnum, supplyUnitEnum } from "./enums";

/**
 * supplies
 *
 * Append-only purchase ledger. `item_key` is the normalised item name
 * (trimmed, lower-case) and links each purchase to its `supply_stock` row.
 */
export const supplies = pgTable(
  "supplies",
  {
    id: idWithTag("supply"),
    name: varchar("name", { length: 120 }).notNull(),
    itemKey: varchar("item_key", { length: 120 }).notNull(),
    category: supplyCategoryEnum("category").notNull(),
    unit: supplyUnitEnum("unit").notNull(),
    quantity: doublePrecision("quantity").notNull(),
    unitCost: doublePrecision("unit_cost").notNull(),
    totalCost: doublePrecision("total_cost").notNull(),
    purchaseDate: date("purchase_date", { mode: "string" }).notNull(),
    supplier: text("supplier"),
    createdAt: createdAt(),
  },
  (table) => ({
    suppliesPurchaseDateIdx: index("supplies_purchase_date_idx").on(table.purchaseDate),
  }),
);

/**
 * supply_stock
 *
 * One row per distinct item. Created by the first purchase with a zero
 * threshold; alert when `current_quantity <= minimum_quantity`.
 */
export const supplyStock = pgTable("supply_stock", {
  id: idWithTag("supply_stock"),
  itemKey: varchar("item_key", { length: 120 }).notNull().unique(),
  name: varchar("name", { length: 120 }).notNull(),
  category: supplyCategoryEnum("category").notNull(),
  unit: supplyUnitEnum("unit").notNull(),
  currentQuantity: doublePrecision("current_quantity").default(0).notNull(),
  minimumQuantity: doublePrecision("minimum_quantity").default(0).notNull(),
  updatedAt: updatedAt(),
});

/** supply_movements: append-only usage (`out`) and manual intake (`in`). */
export const supplyMovements = pgTable(
  "supply_movements",
  {
    id: idWithTag("supply_movement"),
    ...withEventMoment(),
    supplyStockId: idRef("supply_stock_id")
      .references(() => supplyStock.id)
      .notNull(),
    kind: supplyMovementKindEnum("kind").notNull(),
    quantity: doublePrecision("quantity").notNull(),
    reason: text("reason"),
    createdAt: createdAt(),
  },
  (table) => ({
    supplyMovementsDateIdx: index("supply_movements_date_idx").on(table.date),
  }),
);
