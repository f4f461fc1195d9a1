import { doublePrecision, index, pgTable, text, uniqueIndex } from "drizzle-orm/pg-core";
import { createdAt, eggCategoryColumns, idRef, idWithTag, withEventMoment } from "./_common";
import { orderStatusEnum } from "./enums";
import { clients } from "./people";

/**
 * orders
 *
 * Basket counts per category (1 basket = 30 eggs). Created `pending`,
 * editable only while pending, completed only through a dispatch.
 */
export const orders = pgTable(
  "orders",
  {
    id: idWithTag("order"),
    clientId: idRef("client_id")
      .references(() => clients.id)
      .notNull(),
    ...withEventMoment(),
    ...eggCategoryColumns("baskets"),
    totalPrice: doublePrecision("total_price").notNull(),
    status: orderStatusEnum("status").default("pending").notNull(),
    note: text("note"),
    createdAt: createdAt(),
  },
  (table) => ({
    ordersClientIdx: index("orders_client_idx").on(table.clientId),
    ordersStatusIdx: index("orders_status_idx").on(table.status),
    ordersDateIdx: index("orders_date_idx").on(table.date),
  }),
);

/**
 * dispatches
 *
 * Fulfilment of one order. The unique index on `order_id` keeps
 * "completed iff exactly one dispatch" true even if the status check is
 * bypassed. Basket counts may differ from the order's.
 */
export const dispatches = pgTable(
  "dispatches",
  {
    id: idWithTag("dispatch"),
    orderId: idRef("order_id")
      .references(() => orders.id)
      .notNull(),
    ...withEventMoment(),
    ...eggCategoryColumns("baskets"),
    note: text("note"),
    createdAt: createdAt(),
  },
  (table) => ({
    dispatchesOrderUnique: uniqueIndex("dispatches_order_unique").on(table.orderId),
  }),
);
