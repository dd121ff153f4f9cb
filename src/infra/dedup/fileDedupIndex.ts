import { promises as fs } from "node:fs";
import path from "node:path";
import { InMemoryDedupIndex } from "./inMemoryDedupIndex.js";

const HASH_LINE = /^[0-9a-f]{64}$/;

/**
 * Append-only hash log: one SHA-256 hex digest per line. Loaded once on
 * `open`, appended to as chunks are accepted.
 */
export class FileDedupIndex extends InMemoryDedupIndex {
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    private readonly absolutePath: string,
    initial: string[],
  ) {
    super(initial);
  }

  static async open(filePath: string): Promise<FileDedupIndex> {
    const absolutePath = path.resolve(filePath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });

    let raw = "";
    try {
      raw = await fs.readFile(absolutePath, "utf-8");
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    const hashes = raw
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => HASH_LINE.test(line));
    return new FileDedupIndex(absolutePath, hashes);
  }

  get filePath(): string {
    return this.absolutePath;
  }

  async record(contentHash: string): Promise<void> {
    if (this.hashes.has(contentHash)) {
      return;
    }
    await this.enqueueWrite(() => fs.appendFile(this.absolutePath, `${contentHash}\n`, "utf-8"));
    await super.record(contentHash);
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task);
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
