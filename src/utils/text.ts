const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

export function normalizeTags(tags: Iterable<string | null | undefined>): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const tag of tags) {
    const value = tag?.trim().toLowerCase();
    if (!value || seen.has(value)) {
      continue;
    }
    seen.add(value);
    normalized.push(value);
  }

  return normalized;
}
