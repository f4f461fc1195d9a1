import { mkdir, readFile } from "node:fs/promises";
import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import { StoreError } from "./errors";
import { schema, type FarmSchema } from "./tables";

export type FarmDatabase = PgliteDatabase<FarmSchema>;
export type FarmTransaction = Parameters<Parameters<FarmDatabase["transaction"]>[0]>[0];
/** Anything that can run a query: the store itself or an open transaction. */
export type FarmExecutor = FarmDatabase | FarmTransaction;

export const DEFAULT_SCHEMA_PATH = new URL("../sql/schema.sql", import.meta.url);

/** Table whose presence means the schema script has already been applied. */
const MARKER_TABLE = "production_records";

export type StoreOptions = {
  /**
   * Directory holding the database files. Omit (or pass `memory://`) for a
   * throwaway in-memory store.
   */
  dataDir?: string;

  /** Static definition script applied on first open. */
  schemaPath?: string | URL;

  /** Receives one line per lifecycle event (open, schema applied, close). */
  log?: (message: string) => void;
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Explicitly owned handle on the embedded database.
 *
 * Open once at process start, pass to the services, close at shutdown.
 * There is no module-level instance.
 */
export class FarmStore {
  private closed = false;

  private constructor(
    readonly client: PGlite,
    readonly db: FarmDatabase,
    private readonly log: (message: string) => void,
  ) {}

  static async open(options: StoreOptions = {}): Promise<FarmStore> {
    const log = options.log ?? (() => {});
    const dataDir = options.dataDir;
    const location = dataDir && !dataDir.startsWith("memory://") ? dataDir : undefined;

    let client: PGlite;
    try {
      if (location) {
        await mkdir(location, { recursive: true });
      }
      client = new PGlite(location);
      await client.waitReady;
    } catch (error) {
      throw new StoreError("Failed to open store", { dataDir, cause: describe(error) });
    }

    const store = new FarmStore(client, drizzle(client, { schema }), log);
    try {
      const applied = await store.ensureSchema(options.schemaPath ?? DEFAULT_SCHEMA_PATH);
      const where = location ?? "memory://";
      log(applied ? `Store initialised at ${where}` : `Store opened at ${where}`);
    } catch (error) {
      await store.close();
      throw error;
    }
    return store;
  }

  /**
   * Applies the definition script unless the marker table exists.
   * Returns true when the script ran.
   */
  async ensureSchema(schemaPath: string | URL): Promise<boolean> {
    const marker = await this.client.query<{ marker: string | null }>(
      `select to_regclass('public.${MARKER_TABLE}')::text as marker`,
    );
    if (marker.rows[0]?.marker) {
      return false;
    }

    let script: string;
    try {
      script = await readFile(schemaPath, "utf8");
    } catch (error) {
      throw new StoreError("Schema definition script not found", {
        path: String(schemaPath),
        cause: describe(error),
      });
    }

    try {
      // One simple-protocol call: the whole script commits or none of it does.
      await this.client.exec(script);
    } catch (error) {
      throw new StoreError("Failed to apply schema", { cause: describe(error) });
    }
    return true;
  }

  /**
   * Runs `work` as one atomic unit: commit when it resolves, rollback when it
   * throws. Inside `work` use only `tx`; the store serialises access, so a
   * query on `store.db` would wait for this transaction to finish.
   */
  transaction<T>(work: (tx: FarmTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(work);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.close();
    this.log("Store closed");
  }
}

export function openStore(options: StoreOptions = {}): Promise<FarmStore> {
  return FarmStore.open(options);
}
