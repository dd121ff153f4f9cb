export interface DedupIndex {
  contains(contentHash: string): Promise<boolean>;
  record(contentHash: string): Promise<void>;
  size(): number;
}
