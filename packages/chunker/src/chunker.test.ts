import { describe, it, expect } from "vitest";
import { ValidationError } from "@gapscout/errors";
import type { Section } from "@gapscout/types";
import { RecursiveTextSplitter } from "./recursive-text-splitter.js";
import { chunkSections } from "./section-chunker.js";
import type { ITextSplitter } from "./chunker.interface.js";

const SAMPLE_TEXT = `Peer tutoring has been studied in many introductory courses. Most studies report small gains.

Few studies follow students beyond one term, and almost none compare online and in-person formats.

Future work should measure retention over several years and include students from community colleges.`;

describe("RecursiveTextSplitter", () => {
  it("returns short text as a single passage", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 100, chunkOverlap: 0 });
    expect(splitter.split("Hello world")).toEqual(["Hello world"]);
  });

  it("prefers paragraph boundaries", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 30, chunkOverlap: 0 });
    expect(splitter.split("First paragraph here.\n\nSecond paragraph here.")).toEqual([
      "First paragraph here.",
      "Second paragraph here.",
    ]);
  });

  it("carries trailing words into the next passage as overlap", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 4 });
    expect(splitter.split("aa bb cc dd ee")).toEqual(["aa bb cc", "cc dd ee"]);
  });

  it("cuts at characters when no other separator exists", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 4, chunkOverlap: 0 });
    expect(splitter.split("abcdefghij")).toEqual(["abcd", "efgh", "ij"]);
  });

  it("falls back to characters only for the piece that is too long", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 5, chunkOverlap: 0 });
    expect(splitter.split("tiny enormousword")).toEqual(["tiny", "enorm", "ouswo", "rd"]);
  });

  it("splits a very long unbroken string without overflowing the stack", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 2, chunkOverlap: 0 });
    const passages = splitter.split("x".repeat(500_000));
    expect(passages).toHaveLength(250_000);
    expect(passages[249_999]).toBe("xx");
  });

  it("discards whitespace-only passages", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 0 });
    expect(splitter.split("   \n\n  ")).toEqual([]);
    expect(splitter.split("")).toEqual([]);
  });

  it("never produces a passage longer than chunkSize", () => {
    for (const [chunkSize, chunkOverlap] of [
      [40, 10],
      [64, 0],
      [25, 24],
      [7, 3],
    ] as const) {
      const splitter = new RecursiveTextSplitter({ chunkSize, chunkOverlap });
      const passages = splitter.split(SAMPLE_TEXT);

      expect(passages.length).toBeGreaterThan(1);
      for (const passage of passages) {
        expect(passage.length).toBeLessThanOrEqual(chunkSize);
        expect(passage).toBe(passage.trim());
      }
    }
  });

  it("keeps every word of the input", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 50, chunkOverlap: 10 });
    const passages = splitter.split(SAMPLE_TEXT).join(" ");

    for (const word of SAMPLE_TEXT.split(/\s+/)) {
      expect(passages).toContain(word);
    }
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => new RecursiveTextSplitter({ chunkSize: 50, chunkOverlap: 50 })).toThrow(
      ValidationError,
    );
    expect(() => new RecursiveTextSplitter({ chunkSize: 50, chunkOverlap: 80 })).toThrow(
      "chunkOverlap must be smaller than chunkSize",
    );
  });

  it("rejects non-positive sizes and negative overlaps", () => {
    expect(() => new RecursiveTextSplitter({ chunkSize: 0, chunkOverlap: 0 })).toThrow(ValidationError);
    expect(() => new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: -1 })).toThrow(
      ValidationError,
    );
  });

  it("accepts a zero overlap", () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 0 });
    expect(splitter.chunkOverlap).toBe(0);
  });
});

describe("chunkSections", () => {
  const abstract: Section = {
    name: "abstract",
    text: "Abstract\nThis paper studies X.",
    pageStart: 1,
    pageEnd: 1,
  };
  const conclusion: Section = {
    name: "conclusion",
    text: "Conclusion\nX holds under Z.",
    pageStart: 3,
    pageEnd: 3,
  };

  it("produces one chunk per short section with its provenance", () => {
    const result = chunkSections([abstract, conclusion], { chunkSize: 100, chunkOverlap: 0 });

    expect(result.chunks).toEqual(["Abstract\nThis paper studies X.", "Conclusion\nX holds under Z."]);
    expect(result.provenance).toEqual([
      { section: "abstract", pageStart: 1, pageEnd: 1, chunkIndex: 0 },
      { section: "conclusion", pageStart: 3, pageEnd: 3, chunkIndex: 1 },
    ]);
  });

  it("numbers chunks contiguously across sections", () => {
    const discussion: Section = { name: "discussion", text: SAMPLE_TEXT, pageStart: 2, pageEnd: 4 };
    const result = chunkSections([abstract, discussion, conclusion], {
      chunkSize: 40,
      chunkOverlap: 10,
    });

    expect(result.chunks.length).toBe(result.provenance.length);
    expect(result.provenance.map((p) => p.chunkIndex)).toEqual(result.chunks.map((_, i) => i));
    expect(result.provenance[0]?.section).toBe("abstract");
    expect(result.provenance.at(-1)?.section).toBe("conclusion");
    expect(
      result.provenance.filter((p) => p.section === "discussion").every((p) => p.pageStart === 2 && p.pageEnd === 4),
    ).toBe(true);
  });

  it("returns no chunks for no sections", () => {
    expect(chunkSections([], { chunkSize: 100, chunkOverlap: 0 })).toEqual({ chunks: [], provenance: [] });
  });

  it("uses an injected splitter", () => {
    const splitter: ITextSplitter = {
      chunkSize: 100,
      chunkOverlap: 0,
      split: (text) => text.split("\n"),
    };

    const result = chunkSections([abstract], { chunkSize: 100, chunkOverlap: 0 }, splitter);

    expect(result.chunks).toEqual(["Abstract", "This paper studies X."]);
    expect(result.provenance.map((p) => p.chunkIndex)).toEqual([0, 1]);
  });
});
