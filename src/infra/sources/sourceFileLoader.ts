import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { SourceFileError, describeError } from "../../domain/errors.js";
import { SOURCE_TYPES, type SourceFile, type SourceType } from "../../domain/types.js";

export type SourceSelection = "forum" | "repo" | "all";

const SELECTION_DIRECTORIES: Readonly<Record<Exclude<SourceSelection, "all">, string>> = {
  forum: "forum",
  repo: "repo",
};

const DIRECTORY_SOURCE_TYPES: ReadonlyMap<string, SourceType> = new Map<string, SourceType>([
  ["forum", "forum_post"],
  ["reddit", "forum_post"],
  ["repo", "repo_readme"],
  ["github", "repo_readme"],
]);

const envelopeSchema = z.object({
  source_type: z.enum(SOURCE_TYPES),
  records: z.array(z.unknown()),
});

/**
 * JSON files to ingest, sorted by path. A missing selection directory is
 * treated as empty.
 */
export async function resolveSourceFiles(
  dataDir: string,
  selection: SourceSelection,
): Promise<string[]> {
  const directories =
    selection === "all"
      ? Object.values(SELECTION_DIRECTORIES)
      : [SELECTION_DIRECTORIES[selection]];

  const files: string[] = [];
  for (const directory of directories) {
    const absolute = path.resolve(dataDir, directory);
    let entries: string[];
    try {
      entries = await fs.readdir(absolute);
    } catch (error) {
      if (isFileMissing(error)) {
        continue;
      }
      throw new SourceFileError(absolute, describeError(error), { cause: error });
    }
    files.push(
      ...entries
        .filter((entry) => path.extname(entry).toLowerCase() === ".json")
        .map((entry) => path.join(absolute, entry)),
    );
  }

  return files.sort();
}

export async function loadSourceFile(filePath: string): Promise<SourceFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new SourceFileError(filePath, describeError(error), { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SourceFileError(filePath, "invalid JSON", { cause: error });
  }

  if (Array.isArray(parsed)) {
    const sourceType = inferSourceType(filePath);
    if (!sourceType) {
      throw new SourceFileError(
        filePath,
        "cannot infer source type; use an envelope with source_type or place the file under forum/ or repo/",
      );
    }
    return { path: filePath, sourceType, records: parsed };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new SourceFileError(
      filePath,
      "expected a JSON array of records or an object with source_type and records",
    );
  }
  return {
    path: filePath,
    sourceType: envelope.data.source_type,
    records: envelope.data.records,
  };
}

export function inferSourceType(filePath: string): SourceType | null {
  const directory = path.basename(path.dirname(path.resolve(filePath))).toLowerCase();
  return DIRECTORY_SOURCE_TYPES.get(directory) ?? null;
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
