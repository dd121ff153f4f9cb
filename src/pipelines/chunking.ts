export const DEFAULT_MAX_CHARS = 4000;
export const DEFAULT_OVERLAP_CHARS = 200;

// Sentence-ending punctuation (plus closing quotes/brackets) followed by
// whitespace, or a blank line. The whitespace belongs to the preceding unit.
const SENTENCE_BOUNDARY = /[.!?]+["')\]]*\s+|\n[ \t]*\n\s*/g;
const ATOM = /\S+|\s+/g;

export interface ChunkDraft {
  sequenceIndex: number;
  text: string;
  start: number;
  end: number;
  charCount: number;
  /** Leading characters shared with the previous draft. */
  overlapLength: number;
  overlapWithPrevious: boolean;
  /** A single non-whitespace run longer than maxChars. */
  oversized: boolean;
}

interface Piece {
  start: number;
  end: number;
  /** The position at `end` is a sentence boundary. */
  sentenceEnd: boolean;
}

export function chunkText(
  text: string,
  maxChars: number = DEFAULT_MAX_CHARS,
  overlapChars: number = DEFAULT_OVERLAP_CHARS,
): ChunkDraft[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}.`);
  }
  const safeOverlap = Math.min(Math.max(Math.floor(overlapChars), 0), maxChars - 1);

  if (!text.trim()) {
    return [];
  }
  if (text.length <= maxChars) {
    return [buildDraft(text, 0, 0, text.length, 0, maxChars)];
  }

  const pieces = splitIntoPieces(text, maxChars);
  const drafts: ChunkDraft[] = [];
  let first = 0;
  let overlapLength = 0;

  while (first < pieces.length) {
    const stop = packFrom(pieces, first, maxChars);
    const start = pieces[first].start;
    const end = pieces[stop - 1].end;
    drafts.push(buildDraft(text, drafts.length, start, end, overlapLength, maxChars));

    if (stop >= pieces.length) {
      break;
    }

    const next = findOverlapStart(pieces, first, stop, safeOverlap, maxChars);
    overlapLength = end - pieces[next].start;
    first = next;
  }

  return drafts;
}

/** Returns the part of each draft that is not shared with its predecessor. */
export function nonOverlappingText(draft: Pick<ChunkDraft, "text" | "overlapLength">): string {
  return draft.text.slice(draft.overlapLength);
}

function buildDraft(
  text: string,
  sequenceIndex: number,
  start: number,
  end: number,
  overlapLength: number,
  maxChars: number,
): ChunkDraft {
  const slice = text.slice(start, end);
  return {
    sequenceIndex,
    text: slice,
    start,
    end,
    charCount: slice.length,
    overlapLength,
    overlapWithPrevious: overlapLength > 0,
    oversized: slice.length > maxChars,
  };
}

function splitIntoPieces(text: string, maxChars: number): Piece[] {
  const pieces: Piece[] = [];

  for (const sentence of splitIntoSentences(text)) {
    if (sentence.end - sentence.start <= maxChars) {
      pieces.push(sentence);
      continue;
    }
    pieces.push(...splitIntoAtoms(text, sentence, maxChars));
  }

  return pieces;
}

function splitIntoSentences(text: string): Piece[] {
  const sentences: Piece[] = [];
  let start = 0;

  for (const match of text.matchAll(SENTENCE_BOUNDARY)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end <= start) {
      continue;
    }
    sentences.push({ start, end, sentenceEnd: true });
    start = end;
  }

  if (start < text.length) {
    sentences.push({ start, end: text.length, sentenceEnd: true });
  }
  return sentences;
}

// Words stay whole; only whitespace runs longer than maxChars are cut.
function splitIntoAtoms(text: string, sentence: Piece, maxChars: number): Piece[] {
  const atoms: Piece[] = [];
  const body = text.slice(sentence.start, sentence.end);

  for (const match of body.matchAll(ATOM)) {
    const atomStart = sentence.start + (match.index ?? 0);
    const atomEnd = atomStart + match[0].length;
    const isWhitespace = !match[0].trim();

    if (isWhitespace && atomEnd - atomStart > maxChars) {
      for (let cursor = atomStart; cursor < atomEnd; cursor += maxChars) {
        atoms.push({ start: cursor, end: Math.min(cursor + maxChars, atomEnd), sentenceEnd: false });
      }
      continue;
    }
    atoms.push({ start: atomStart, end: atomEnd, sentenceEnd: false });
  }

  if (atoms.length > 0) {
    atoms[atoms.length - 1].sentenceEnd = sentence.sentenceEnd;
  }
  return atoms;
}

/** Index one past the last piece that fits in a chunk opening at `first`. */
function packFrom(pieces: Piece[], first: number, maxChars: number): number {
  const start = pieces[first].start;
  let stop = first;
  while (stop < pieces.length && pieces[stop].end - start <= maxChars) {
    stop += 1;
  }
  return stop === first ? first + 1 : stop;
}

function findOverlapStart(
  pieces: Piece[],
  first: number,
  stop: number,
  overlapChars: number,
  maxChars: number,
): number {
  if (overlapChars === 0) {
    return stop;
  }

  const end = pieces[stop - 1].end;
  const target = end - overlapChars;
  const before: number[] = [];
  const after: number[] = [];

  for (let index = first + 1; index < stop; index += 1) {
    if (!pieces[index - 1].sentenceEnd) {
      continue;
    }
    if (pieces[index].start <= target) {
      before.push(index);
    } else {
      after.push(index);
    }
  }

  const candidates = [...before.reverse(), ...after];
  for (const candidate of candidates) {
    if (packFrom(pieces, candidate, maxChars) > stop) {
      return candidate;
    }
  }
  return stop;
}
