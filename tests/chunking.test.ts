import { describe, expect, it } from "vitest";
import { chunkText, nonOverlappingText } from "../src/pipelines/chunking.js";

function sentence(index: number): string {
  return `Sentence ${index} describes a prompt pattern`.padEnd(98, " x").slice(0, 98) + ". ";
}

function sentences(count: number): string {
  return Array.from({ length: count }, (_, index) => sentence(index)).join("");
}

describe("chunkText", () => {
  it("keeps a text within max_chars as a single chunk", () => {
    const text = sentences(35);
    expect(text).toHaveLength(3500);

    const drafts = chunkText(text, 4000, 200);
    expect(drafts).toHaveLength(1);
    expect(drafts[0].text).toBe(text);
    expect(drafts[0].overlapWithPrevious).toBe(false);
    expect(drafts[0].overlapLength).toBe(0);
  });

  it("overlaps consecutive chunks on sentence boundaries", () => {
    const text = sentences(90);
    expect(text).toHaveLength(9000);

    const drafts = chunkText(text, 4000, 200);
    expect(drafts.map((draft) => [draft.start, draft.end])).toEqual([
      [0, 4000],
      [3800, 7800],
      [7600, 9000],
    ]);
    expect(drafts[1].overlapLength).toBe(200);
    expect(drafts[1].overlapWithPrevious).toBe(true);
    expect(drafts[1].text.startsWith(text.slice(3800, 4000))).toBe(true);
    expect(drafts[1].text.startsWith("Sentence 38 ")).toBe(true);
    expect(drafts[2].text.startsWith("Sentence 76 ")).toBe(true);
  });

  it("reconstructs the input from the non-overlapping portions", () => {
    const text = [
      "Prompt chaining splits a task into steps! Each step feeds the next.",
      "",
      "Why does it work? Models handle focused instructions better.",
      "A very-long-token-without-spaces-that-keeps-going-and-going appears here.",
      "Short tail.",
    ].join("\n");

    const drafts = chunkText(text, 60, 20);
    expect(drafts.length).toBeGreaterThan(2);
    expect(drafts.map(nonOverlappingText).join("")).toBe(text);
    expect(drafts.map((draft) => draft.sequenceIndex)).toEqual(drafts.map((_, index) => index));
  });

  it("bounds chunk size unless a chunk is a single oversized token", () => {
    const text = sentences(12) + "z".repeat(150) + " trailing words.";
    const drafts = chunkText(text, 120, 30);

    for (const draft of drafts) {
      if (draft.oversized) {
        expect(draft.text).toBe("z".repeat(150));
      } else {
        expect(draft.charCount).toBeLessThanOrEqual(120);
      }
    }
    expect(drafts.filter((draft) => draft.oversized)).toHaveLength(1);
  });

  it("emits an unsplittable token as its own oversized chunk", () => {
    const text = `Intro words. ${"a".repeat(50)} tail end.`;
    const drafts = chunkText(text, 20, 0);

    expect(drafts.map((draft) => draft.text)).toEqual(["Intro words. ", "a".repeat(50), " tail end."]);
    expect(drafts.map((draft) => draft.oversized)).toEqual([false, true, false]);
  });

  it("is deterministic", () => {
    const text = sentences(40);
    expect(chunkText(text, 1000, 150)).toEqual(chunkText(text, 1000, 150));
  });

  it("returns no chunks for blank text", () => {
    expect(chunkText("", 100, 10)).toEqual([]);
    expect(chunkText(" \n\t ", 100, 10)).toEqual([]);
  });

  it("rejects a non-positive max_chars and clamps the overlap", () => {
    expect(() => chunkText("text", 0, 0)).toThrow(RangeError);

    const text = sentences(5);
    const drafts = chunkText(text, 200, 1000);
    expect(drafts.map(nonOverlappingText).join("")).toBe(text);
    for (const draft of drafts) {
      expect(draft.charCount).toBeLessThanOrEqual(200);
    }
  });
});
