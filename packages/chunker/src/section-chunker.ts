import type { ChunkingConfig, ChunkingResult, Section } from "@gapscout/types";
import type { ITextSplitter } from "./chunker.interface.js";
import { RecursiveTextSplitter } from "./recursive-text-splitter.js";

/**
 * Split each section into passages, in section order. Every passage carries
 * its section's name and page range; `chunkIndex` runs across the whole
 * document starting at 0.
 */
export function chunkSections(
  sections: readonly Section[],
  config: ChunkingConfig,
  splitter: ITextSplitter = new RecursiveTextSplitter(config),
): ChunkingResult {
  const result: ChunkingResult = { chunks: [], provenance: [] };

  for (const section of sections) {
    for (const passage of splitter.split(section.text)) {
      result.provenance.push({
        section: section.name,
        pageStart: section.pageStart,
        pageEnd: section.pageEnd,
        chunkIndex: result.chunks.length,
      });
      result.chunks.push(passage);
    }
  }

  return result;
}
