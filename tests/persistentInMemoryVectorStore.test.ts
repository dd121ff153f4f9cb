import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError, VectorStoreWriteError } from "../src/domain/errors.js";
import { PersistentInMemoryVectorStore } from "../src/infra/store/persistentInMemoryVectorStore.js";
import { storedPayload } from "./helpers/payloads.js";

const TEMP_DIR = path.resolve(".tmp-tests-persistent");
const TEMP_FILE = path.join(TEMP_DIR, "vector-index.json");

describe("PersistentInMemoryVectorStore", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("restores stored chunks after restart", async () => {
    const store1 = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await store1.initialize();
    await store1.upsert("forum_post:1#0", [0.1, 0.2, 0.3], storedPayload());
    await store1.close();

    const store2 = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await store2.initialize();

    expect(await store2.count()).toBe(1);
    expect(await store2.listContentHashes()).toEqual(["a".repeat(64)]);
    const [hit] = await store2.query([0.1, 0.2, 0.3], { category: "forum" }, 3);
    expect(hit.id).toBe("forum_post:1#0");
    expect(hit.payload).toEqual(storedPayload());

    const info = await store2.getStorageInfo();
    expect(info.exists).toBe(true);
    expect(info.format_version).toBe(1);
    expect(info.size_bytes).toBeGreaterThan(0);
  });

  it("enforces max index file size", async () => {
    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 120 });
    await store.initialize();

    const write = store.upsert("big", [1], storedPayload({ text: "A".repeat(200) }));
    await expect(write).rejects.toBeInstanceOf(VectorStoreWriteError);
    await expect(write).rejects.toThrow("exceeds size limit");
  });

  it("rolls back a point whose snapshot write fails", async () => {
    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 2_500 });
    await store.initialize();
    await store.upsert("forum_post:1#0", [1, 0], storedPayload());

    const oversized = store.upsert(
      "forum_post:2#0",
      [0, 1],
      storedPayload({ chunk_id: "forum_post:2#0", text: "B".repeat(3_000) }),
    );
    await expect(oversized).rejects.toMatchObject({
      code: "VECTOR_STORE_WRITE",
      retryable: false,
    });
    expect(await store.count()).toBe(1);

    await store.upsert(
      "forum_post:3#0",
      [1, 1],
      storedPayload({ chunk_id: "forum_post:3#0", content_hash: "c".repeat(64) }),
    );
    expect(await store.count()).toBe(2);
    await store.close();

    const reopened = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 2_500 });
    const ids = (await reopened.query([1, 1], {}, 10)).map((hit) => hit.id).sort();
    expect(ids).toEqual(["forum_post:1#0", "forum_post:3#0"]);
  });

  it("keeps the previous point when a replacing write fails", async () => {
    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 2_500 });
    await store.upsert("forum_post:1#0", [1, 0], storedPayload());

    await expect(
      store.upsert("forum_post:1#0", [1, 0], storedPayload({ text: "C".repeat(3_000) })),
    ).rejects.toBeInstanceOf(VectorStoreWriteError);

    const [hit] = await store.query([1, 0], {}, 1);
    expect(hit.payload.text).toBe("Chunk text.");
  });

  it("refuses a corrupted snapshot", async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(TEMP_FILE, JSON.stringify({ format_version: 1, snapshot: {} }), "utf-8");

    const store = new PersistentInMemoryVectorStore(TEMP_FILE, { maxBytes: 1_000_000 });
    await expect(store.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });
});
