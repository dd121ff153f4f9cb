import type { DedupIndex } from "../../domain/dedupIndex.js";

export class InMemoryDedupIndex implements DedupIndex {
  protected readonly hashes: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.hashes = new Set(initial);
  }

  async contains(contentHash: string): Promise<boolean> {
    return this.hashes.has(contentHash);
  }

  async record(contentHash: string): Promise<void> {
    this.hashes.add(contentHash);
  }

  size(): number {
    return this.hashes.size;
  }
}
