import { describe, expect, it } from "vitest";
import { InMemoryDedupIndex } from "../src/infra/dedup/inMemoryDedupIndex.js";
import { DedupGuard, computeContentHash, isDuplicate, record } from "../src/pipelines/dedup.js";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

describe("content hashing", () => {
  it("hashes trimmed text with collapsed whitespace", () => {
    expect(computeContentHash("hello")).toBe(HELLO_SHA256);
    expect(computeContentHash("  hello \n")).toBe(HELLO_SHA256);
    expect(computeContentHash("a  b\n\tc")).toBe(computeContentHash("a b c"));
    expect(computeContentHash("a b")).not.toBe(computeContentHash("ab"));
  });

  it("checks and records hashes in an index", async () => {
    const index = new InMemoryDedupIndex();
    const hash = computeContentHash("some chunk");

    expect(await isDuplicate(hash, index)).toBe(false);
    await record(hash, index);
    expect(await isDuplicate(hash, index)).toBe(true);
    expect(index.size()).toBe(1);
  });
});

describe("DedupGuard", () => {
  it("lets exactly one concurrent claimant accept a new hash", async () => {
    const guard = new DedupGuard(new InMemoryDedupIndex(), { persist: true });
    const hash = computeContentHash("shared chunk");

    const claims = await Promise.all(Array.from({ length: 10 }, () => guard.claim(hash)));
    expect(claims.filter(Boolean)).toHaveLength(1);
  });

  it("rejects hashes already in the index", async () => {
    const hash = computeContentHash("known chunk");
    const guard = new DedupGuard(new InMemoryDedupIndex([hash]), { persist: true });
    expect(await guard.claim(hash)).toBe(false);
  });

  it("records committed hashes only when persisting", async () => {
    const hash = computeContentHash("chunk");

    const persisted = new InMemoryDedupIndex();
    const guard = new DedupGuard(persisted, { persist: true });
    await guard.claim(hash);
    await guard.commit(hash);
    expect(await persisted.contains(hash)).toBe(true);

    const dryIndex = new InMemoryDedupIndex();
    const dryGuard = new DedupGuard(dryIndex, { persist: false });
    expect(await dryGuard.claim(hash)).toBe(true);
    await dryGuard.commit(hash);
    expect(dryIndex.size()).toBe(0);
    expect(await dryGuard.claim(hash)).toBe(false);
  });

  it("frees a reservation on release", async () => {
    const guard = new DedupGuard(new InMemoryDedupIndex(), { persist: true });
    const hash = computeContentHash("failed chunk");

    expect(await guard.claim(hash)).toBe(true);
    guard.release(hash);
    expect(await guard.claim(hash)).toBe(true);
  });

  it("shares reservations between persisting guards on the same index", async () => {
    const index = new InMemoryDedupIndex();
    const hash = computeContentHash("content seen by two runs");
    const first = new DedupGuard(index, { persist: true });
    const second = new DedupGuard(index, { persist: true });

    const claims = await Promise.all([first.claim(hash), second.claim(hash)]);
    expect(claims.filter(Boolean)).toHaveLength(1);

    const winner = claims[0] ? first : second;
    await winner.commit(hash);
    expect(await new DedupGuard(index, { persist: true }).claim(hash)).toBe(false);
  });

  it("keeps dry-run reservations away from other guards", async () => {
    const index = new InMemoryDedupIndex();
    const hash = computeContentHash("rehearsed chunk");
    const dryRun = new DedupGuard(index, { persist: false });

    expect(await dryRun.claim(hash)).toBe(true);
    const live = new DedupGuard(index, { persist: true });
    expect(await live.claim(hash)).toBe(true);
    expect(await new DedupGuard(index, { persist: false }).claim(hash)).toBe(false);
  });
});
