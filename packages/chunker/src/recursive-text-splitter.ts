import type { ChunkingConfig } from "@gapscout/types";
import { ValidationError } from "@gapscout/errors";
import type { ITextSplitter } from "./chunker.interface.js";

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

// Spreading into push() overflows the call stack for very long inputs.
function appendAll(target: string[], items: readonly string[]): void {
  for (const item of items) target.push(item);
}

/**
 * Recursive splitting with separator hierarchy, measured in characters.
 * Tries larger separators first (paragraph, line, word) and falls back to
 * single characters. Small pieces are merged back into passages of at most
 * `chunkSize` characters; trailing pieces of up to `chunkOverlap` characters
 * are repeated at the start of the next passage.
 */
export class RecursiveTextSplitter implements ITextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(config: ChunkingConfig) {
    const { chunkSize, chunkOverlap } = config;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError("chunkSize must be a positive integer", {
        chunkSize: String(chunkSize),
      });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ValidationError("chunkOverlap must be a non-negative integer", {
        chunkOverlap: String(chunkOverlap),
      });
    }
    if (chunkOverlap >= chunkSize) {
      throw new ValidationError("chunkOverlap must be smaller than chunkSize", {
        chunkOverlap: String(chunkOverlap),
        chunkSize: String(chunkSize),
      });
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
    this.separators = config.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): string[] {
    return this.splitRecursive(text, this.separators)
      .map((passage) => passage.trim())
      .filter((passage) => passage.length > 0);
  }

  private splitRecursive(text: string, separators: string[]): string[] {
    // First separator present in the text; "" always matches.
    const index = separators.findIndex((sep) => sep === "" || text.includes(sep));
    const separator = index === -1 ? "" : (separators[index] ?? "");
    const remaining = index === -1 ? [] : separators.slice(index + 1);

    const pieces = (separator === "" ? Array.from(text) : text.split(separator)).filter(
      (piece) => piece.length > 0,
    );

    const passages: string[] = [];
    let small: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        small.push(piece);
        continue;
      }

      if (small.length > 0) {
        appendAll(passages, this.merge(small, separator));
        small = [];
      }

      if (remaining.length > 0) {
        appendAll(passages, this.splitRecursive(piece, remaining));
      } else {
        appendAll(passages, this.hardCut(piece));
      }
    }

    if (small.length > 0) {
      appendAll(passages, this.merge(small, separator));
    }

    return passages;
  }

  /** Greedily join pieces up to chunkSize, carrying a tail of at most chunkOverlap. */
  private merge(pieces: string[], separator: string): string[] {
    const passages: string[] = [];
    let current: string[] = [];
    let total = 0;

    const joinCost = () => (current.length > 0 ? separator.length : 0);

    for (const piece of pieces) {
      if (total + piece.length + joinCost() > this.chunkSize && current.length > 0) {
        passages.push(current.join(separator));

        while (
          current.length > 0 &&
          (total > this.chunkOverlap || total + piece.length + joinCost() > this.chunkSize)
        ) {
          const dropped = current.shift() ?? "";
          total -= dropped.length + (current.length > 0 ? separator.length : 0);
        }
      }

      total += piece.length + joinCost();
      current.push(piece);
    }

    if (current.length > 0) {
      passages.push(current.join(separator));
    }

    return passages;
  }

  private hardCut(text: string): string[] {
    const cuts: string[] = [];
    for (let i = 0; i < text.length; i += this.chunkSize) {
      cuts.push(text.slice(i, i + this.chunkSize));
    }
    return cuts;
  }
}
