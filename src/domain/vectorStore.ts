import type { Category, StoredPayload } from "./types.js";

export interface VectorQueryFilter {
  category?: Category;
  tags?: string[];
  createdFrom?: string;
  createdTo?: string;
}

export interface VectorQueryHit {
  id: string;
  payload: StoredPayload;
  score: number;
}

export interface VectorStore {
  initialize(): Promise<void>;
  upsert(id: string, vector: number[], payload: StoredPayload): Promise<void>;
  query(vector: number[], filter: VectorQueryFilter, topK: number): Promise<VectorQueryHit[]>;
  listContentHashes(): Promise<string[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}

export function matchesFilter(payload: StoredPayload, filter: VectorQueryFilter): boolean {
  if (filter.category && payload.category !== filter.category) {
    return false;
  }
  if (filter.tags && filter.tags.length > 0) {
    const wanted = new Set(filter.tags.map((tag) => tag.toLowerCase()));
    if (!payload.tags.some((tag) => wanted.has(tag))) {
      return false;
    }
  }
  if (filter.createdFrom || filter.createdTo) {
    if (!payload.created_at) {
      return false;
    }
    const created = Date.parse(payload.created_at);
    if (filter.createdFrom && created < Date.parse(filter.createdFrom)) {
      return false;
    }
    if (filter.createdTo && created > Date.parse(filter.createdTo)) {
      return false;
    }
  }
  return true;
}
