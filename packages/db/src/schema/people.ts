import { boolean, pgTable, text, varchar } from "drizzle-orm/pg-core";
import { createdAt, idWithTag } from "./_common";

/**
 * clients
 *
 * Egg buyers. Never deleted: deactivation flips `active` so historical
 * orders keep their reference.
 */
export const clients = pgTable("clients", {
  id: idWithTag("client"),
  name: varchar("name", { length: 120 }).notNull(),
  contact: text("contact"),
  active: boolean("active").default(true).notNull(),
  createdAt: createdAt(),
});

/** workers: farm staff receiving payments. Soft-deleted like clients. */
export const workers = pgTable("workers", {
  id: idWithTag("worker"),
  name: varchar("name", { length: 120 }).notNull(),
  role: varchar("role", { length: 80 }),
  active: boolean("active").default(true).notNull(),
  createdAt: createdAt(),
});
