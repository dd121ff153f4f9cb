import type { StoredPayload } from "../../domain/types.js";
import {
  matchesFilter,
  type VectorQueryFilter,
  type VectorQueryHit,
  type VectorStore,
} from "../../domain/vectorStore.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface StoredPoint {
  id: string;
  vector: number[];
  payload: StoredPayload;
}

export interface InMemoryVectorStoreSnapshot {
  points: StoredPoint[];
}

export class InMemoryVectorStore implements VectorStore {
  protected pointsById = new Map<string, StoredPoint>();

  async initialize(): Promise<void> {}

  async upsert(id: string, vector: number[], payload: StoredPayload): Promise<void> {
    this.pointsById.set(id, { id, vector: [...vector], payload });
  }

  async query(
    vector: number[],
    filter: VectorQueryFilter,
    topK: number,
  ): Promise<VectorQueryHit[]> {
    if (topK <= 0) {
      return [];
    }

    return [...this.pointsById.values()]
      .filter((point) => matchesFilter(point.payload, filter))
      .map((point) => ({
        id: point.id,
        payload: point.payload,
        score: cosineSimilarity(vector, point.vector),
      }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, topK);
  }

  async listContentHashes(): Promise<string[]> {
    const hashes = new Set<string>();
    for (const point of this.pointsById.values()) {
      hashes.add(point.payload.content_hash);
    }
    return [...hashes];
  }

  async count(): Promise<number> {
    return this.pointsById.size;
  }

  async close(): Promise<void> {}

  exportSnapshot(): InMemoryVectorStoreSnapshot {
    return {
      points: [...this.pointsById.values()].sort((a, b) => a.id.localeCompare(b.id)),
    };
  }

  importSnapshot(snapshot: InMemoryVectorStoreSnapshot): void {
    this.pointsById = new Map(snapshot.points.map((point) => [point.id, point]));
  }
}
