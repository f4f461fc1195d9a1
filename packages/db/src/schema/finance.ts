import { date, doublePrecision, index, pgTable, text, varchar } from "drizzle-orm/pg-core";
import { createdAt, idRef, idWithTag, withEventMoment } from "./_common";
import { movementTypeEnum } from "./enums";
import { workers } from "./people";

/** worker_payments: every insert books one expense movement. */
export const workerPayments = pgTable(
  "worker_payments",
  {
    id: idWithTag("payment"),
    workerId: idRef("worker_id")
      .references(() => workers.id)
      .notNull(),
    ...withEventMoment(),
    amount: doublePrecision("amount").notNull(),
    concept: text("concept"),
    createdAt: createdAt(),
  },
  (table) => ({
    workerPaymentsDateIdx: index("worker_payments_date_idx").on(table.date),
  }),
);

/**
 * financial_movements
 *
 * Append-only income/expense ledger and the only input to balance reports.
 * Rows are written by the derived-state rules, never by callers directly.
 * `reference_table` + `reference_id` point back at the originating event.
 */
export const financialMovements = pgTable(
  "financial_movements",
  {
    id: idWithTag("movement"),
    date: date("date", { mode: "string" }).notNull(),
    type: movementTypeEnum("type").notNull(),
    category: varchar("category", { length: 80 }).notNull(),
    amount: doublePrecision("amount").notNull(),
    description: text("description"),
    referenceId: idRef("reference_id"),
    referenceTable: varchar("reference_table", { length: 60 }),
    createdAt: createdAt(),
  },
  (table) => ({
    financialMovementsDateIdx: index("financial_movements_date_idx").on(table.date),
    financialMovementsTypeIdx: index("financial_movements_type_idx").on(table.type),
  }),
);
