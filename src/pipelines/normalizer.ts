import { MalformedRecordError } from "../domain/errors.js";
import type { Document, SourceType } from "../domain/types.js";
import { EXTRACTORS, type NestedRecord } from "./extractors.js";

export type NormalizeResult =
  | { ok: true; document: Document }
  | { ok: false; error: MalformedRecordError };

export function normalizeRecord(raw: unknown, sourceType: SourceType): NormalizeResult {
  const result = EXTRACTORS[sourceType].extract(raw);
  if (!result.ok) {
    return { ok: false, error: new MalformedRecordError(sourceType, result.issues) };
  }
  return result;
}

/** Child records carried inline by a parent, e.g. a post's top comments. */
export function expandRecord(raw: unknown, sourceType: SourceType): NestedRecord[] {
  return EXTRACTORS[sourceType].children(raw);
}

export function describeRecord(raw: unknown, sourceType: SourceType, position: number): string {
  if (raw && typeof raw === "object") {
    const candidate = "id" in raw ? raw.id : "repo" in raw ? raw.repo : null;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return `${sourceType}:${candidate}`;
    }
  }
  return `${sourceType}#${position}`;
}
