// Common utilities
export * from "./schema/_common";
export * from "./schema/enums";

// Schema exports
export * from "./schema/production";
export * from "./schema/people";
export * from "./schema/pricing";
export * from "./schema/orders";
export * from "./schema/supplies";
export * from "./schema/finance";
export * from "./schema/flock";

export { schema } from "./tables";
export type { FarmSchema } from "./tables";
export { generateId } from "./id";
export * from "./errors";
export {
  DEFAULT_SCHEMA_PATH,
  FarmStore,
  openStore,
  type FarmDatabase,
  type FarmExecutor,
  type FarmTransaction,
  type StoreOptions,
} from "./store";
export type * from "./types";
