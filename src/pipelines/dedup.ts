import { createHash } from "node:crypto";
import type { DedupIndex } from "../domain/dedupIndex.js";
import { collapseWhitespace } from "../utils/text.js";
import { Mutex } from "../utils/mutex.js";

export function normalizeForHash(text: string): string {
  return collapseWhitespace(text);
}

export function computeContentHash(text: string): string {
  return createHash("sha256").update(normalizeForHash(text), "utf8").digest("hex");
}

export function isDuplicate(contentHash: string, index: DedupIndex): Promise<boolean> {
  return index.contains(contentHash);
}

export function record(contentHash: string, index: DedupIndex): Promise<void> {
  return index.record(contentHash);
}

export interface DedupGuardOptions {
  /** When false, accepted hashes are reserved for this run only. */
  persist: boolean;
}

interface ReservationState {
  mutex: Mutex;
  reserved: Set<string>;
}

// Persisting runs over the same index share one mutex and one reservation set.
const sharedReservations = new WeakMap<DedupIndex, ReservationState>();

function sharedStateFor(index: DedupIndex): ReservationState {
  let state = sharedReservations.get(index);
  if (!state) {
    state = { mutex: new Mutex(), reserved: new Set() };
    sharedReservations.set(index, state);
  }
  return state;
}

/**
 * Run view of a DedupIndex. Check-and-reserve happens under a mutex shared by
 * every persisting guard on the same index, so concurrent workers and
 * concurrent runs cannot both accept the same new content hash. A dry-run
 * guard keeps its reservations to itself but still sees hashes that
 * persisting runs hold.
 */
export class DedupGuard {
  private readonly state: ReservationState;

  constructor(
    private readonly index: DedupIndex,
    private readonly options: DedupGuardOptions,
  ) {
    this.state = options.persist
      ? sharedStateFor(index)
      : { mutex: new Mutex(), reserved: new Set() };
  }

  claim(contentHash: string): Promise<boolean> {
    return this.state.mutex.runExclusive(async () => {
      if (this.isHeld(contentHash) || (await isDuplicate(contentHash, this.index))) {
        return false;
      }
      this.state.reserved.add(contentHash);
      return true;
    });
  }

  commit(contentHash: string): Promise<void> {
    if (!this.options.persist) {
      return Promise.resolve();
    }
    return this.state.mutex.runExclusive(async () => {
      await record(contentHash, this.index);
      this.state.reserved.delete(contentHash);
    });
  }

  release(contentHash: string): void {
    this.state.reserved.delete(contentHash);
  }

  private isHeld(contentHash: string): boolean {
    if (this.state.reserved.has(contentHash)) {
      return true;
    }
    if (this.options.persist) {
      return false;
    }
    return sharedReservations.get(this.index)?.reserved.has(contentHash) ?? false;
  }
}
