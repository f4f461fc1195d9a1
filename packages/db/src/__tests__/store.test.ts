import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";
import { StoreError } from "../errors";
import { EGG_STOCK_ID, eggStock } from "../schema/production";
import { clients } from "../schema/people";
import { openStore, type FarmStore } from "../store";

describe("store.ts", () => {
  const opened: FarmStore[] = [];
  const directories: string[] = [];

  afterEach(async () => {
    for (const store of opened.splice(0)) {
      await store.close();
    }
    for (const directory of directories.splice(0)) {
      await rm(directory, { recursive: true, force: true });
    }
  });

  async function open(options: Parameters<typeof openStore>[0] = {}) {
    const store = await openStore(options);
    opened.push(store);
    return store;
  }

  it("should seed the egg stock row with zeroes", async () => {
    const store = await open();
    const row = await store.db.query.eggStock.findFirst({ where: eq(eggStock.id, EGG_STOCK_ID) });

    expect(row).toMatchObject({ c: 0, b: 0, a: 0, aa: 0, aaa: 0, jumbo: 0 });
  });

  it("should apply the schema only on first open of a directory", async () => {
    const directory = await mkdtemp(join(tmpdir(), "layerfarm-store-"));
    directories.push(directory);
    const messages: string[] = [];

    const first = await openStore({ dataDir: directory, log: (message) => messages.push(message) });
    await first.db.insert(clients).values({ name: "Ana Torres" });
    await first.close();

    const second = await open({ dataDir: directory, log: (message) => messages.push(message) });
    const rows = await second.db.select().from(clients);

    expect(rows.map((row) => row.name)).toEqual(["Ana Torres"]);
    expect(messages).toEqual([
      `Store initialised at ${directory}`,
      "Store closed",
      `Store opened at ${directory}`,
    ]);
  });

  it("should fail with StoreError when the schema script is missing", async () => {
    const failure = openStore({ schemaPath: join(tmpdir(), "layerfarm-missing", "schema.sql") });

    await expect(failure).rejects.toBeInstanceOf(StoreError);
    await expect(failure).rejects.toThrow("Schema definition script not found");
  });

  it("should roll back every write when the unit of work throws", async () => {
    const store = await open();

    await expect(
      store.transaction(async (tx) => {
        await tx.insert(clients).values({ name: "Ana Torres" });
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(await store.db.select().from(clients)).toEqual([]);
  });

  it("should commit when the unit of work resolves", async () => {
    const store = await open();
    const id = await store.transaction(async (tx) => {
      const [row] = await tx.insert(clients).values({ name: "Ana Torres" }).returning({ id: clients.id });
      return row.id;
    });

    expect(id.startsWith("client_")).toBe(true);
    expect(await store.db.select().from(clients)).toHaveLength(1);
  });

  it("should tolerate closing twice", async () => {
    const store = await openStore();
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
