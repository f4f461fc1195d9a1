import type { dispatches, orders } from "./schema/orders";
import type { clients, workers } from "./schema/people";
import type { priceSchedules } from "./schema/pricing";
import type { eggStock, eggStockAdjustments, productionRecords } from "./schema/production";
import type { financialMovements, workerPayments } from "./schema/finance";
import type { chickenPopulation, feedConsumption } from "./schema/flock";
import type { supplies, supplyMovements, supplyStock } from "./schema/supplies";

/** Row types as read back from the store. */
export type ProductionRecord = typeof productionRecords.$inferSelect;
export type EggStockRow = typeof eggStock.$inferSelect;
export type EggStockAdjustment = typeof eggStockAdjustments.$inferSelect;
export type Client = typeof clients.$inferSelect;
export type Worker = typeof workers.$inferSelect;
export type PriceSchedule = typeof priceSchedules.$inferSelect;
export type Order = typeof orders.$inferSelect;
export type Dispatch = typeof dispatches.$inferSelect;
export type Supply = typeof supplies.$inferSelect;
export type SupplyStockRow = typeof supplyStock.$inferSelect;
export type SupplyMovement = typeof supplyMovements.$inferSelect;
export type WorkerPayment = typeof workerPayments.$inferSelect;
export type FinancialMovement = typeof financialMovements.$inferSelect;
export type ChickenPopulation = typeof chickenPopulation.$inferSelect;
export type FeedConsumption = typeof feedConsumption.$inferSelect;
