import { doublePrecision, index, integer, pgTable, text } from "drizzle-orm/pg-core";
import { createdAt, idWithTag, withEventMoment } from "./_common";

/**
 * chicken_population
 *
 * Periodic head counts. The latest row by (date, time) is the current
 * population.
 */
export const chickenPopulation = pgTable(
  "chicken_population",
  {
    id: idWithTag("population"),
    ...withEventMoment(),
    totalCount: integer("total_count").notNull(),
    discards: integer("discards").default(0).notNull(),
    note: text("note"),
    createdAt: createdAt(),
  },
  (table) => ({
    chickenPopulationDateIdx: index("chicken_population_date_idx").on(table.date),
  }),
);

/** feed_consumption: grams per bird, bird count snapshot, and their product. */
export const feedConsumption = pgTable(
  "feed_consumption",
  {
    id: idWithTag("feed"),
    ...withEventMoment(),
    perBirdGrams: doublePrecision("per_bird_grams").notNull(),
    birdCount: integer("bird_count").notNull(),
    totalGrams: doublePrecision("total_grams").notNull(),
    note: text("note"),
    createdAt: createdAt(),
  },
  (table) => ({
    feedConsumptionDateIdx: index("feed_consumption_date_idx").on(table.date),
  }),
);
