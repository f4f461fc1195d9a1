import * as enumsSchema from "./schema/enums";
import * as productionSchema from "./schema/production";
import * as peopleSchema from "./schema/people";
import * as pricingSchema from "./schema/pricing";
import * as ordersSchema from "./schema/orders";
import * as suppliesSchema from "./schema/supplies";
import * as financeSchema from "./schema/finance";
import * as flockSchema from "./schema/flock";

/**
 * Unified Drizzle schema registry handed to `drizzle()` so `db.query.*`
 * knows every table.
 */
export const schema = {
  ...enumsSchema,
  ...productionSchema,
  ...peopleSchema,
  ...pricingSchema,
  ...ordersSchema,
  ...suppliesSchema,
  ...financeSchema,
  ...flockSchema,
};

export type FarmSchema = typeof schema;
