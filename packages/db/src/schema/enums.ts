import { pgEnum } from "drizzle-orm/pg-core";
import {
  ADJUSTMENT_KINDS,
  MOVEMENT_TYPES,
  ORDER_STATUSES,
  SUPPLY_CATEGORIES,
  SUPPLY_MOVEMENT_KINDS,
  SUPPLY_UNITS,
} from "@layerfarm/schema";

/**
 * Enum registry.
 *
 * Values come from @layerfarm/schema so the API validators and the column
 * types cannot drift. `sql/schema.sql` declares the same types by hand.
 */

/** Order lifecycle: pending -> completed (by dispatch) | cancelled. */
export const orderStatusEnum = pgEnum("order_status", ORDER_STATUSES);

/** Egg stock adjustment kind. Loss rows always hold non-positive deltas. */
export const adjustmentKindEnum = pgEnum("adjustment_kind", ADJUSTMENT_KINDS);

export const supplyCategoryEnum = pgEnum("supply_category", SUPPLY_CATEGORIES);

export const supplyUnitEnum = pgEnum("supply_unit", SUPPLY_UNITS);

export const supplyMovementKindEnum = pgEnum("supply_movement_kind", SUPPLY_MOVEMENT_KINDS);

/** Ledger direction. */
export const movementTypeEnum = pgEnum("movement_type", MOVEMENT_TYPES);
