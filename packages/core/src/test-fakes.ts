import type { EmbeddingResult } from "@gapscout/types";
import type { IOcrEngine, IPdfLoader, PdfDocument } from "@gapscout/parser";
import type { IEmbeddingProvider } from "@gapscout/embeddings";
import type { ITextGenerator } from "@gapscout/generation";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** A loader whose pages hold fixed text; rendering a page yields its text as bytes. */
export class FakePdfLoader implements IPdfLoader {
  loads = 0;

  constructor(
    private readonly pageTexts: string[],
    private readonly info: Record<string, unknown> = {},
  ) {}

  async load(_data: Uint8Array): Promise<PdfDocument> {
    this.loads++;
    const texts = this.pageTexts;
    return {
      pageCount: texts.length,
      info: this.info,
      async getPage(pageNumber: number) {
        const text = texts[pageNumber - 1] ?? "";
        return {
          pageNumber,
          extractText: async () => text,
          renderImage: async () => encoder.encode(text),
        };
      },
      close: async () => undefined,
    };
  }
}

/** Reads back the text a {@link FakePdfLoader} page rendered. */
export class EchoOcrEngine implements IOcrEngine {
  readonly name = "echo";
  calls = 0;

  async recognize(image: Uint8Array, _lang: string): Promise<string> {
    this.calls++;
    return decoder.decode(image);
  }

  async terminate(): Promise<void> {}
}

const VOCABULARY = ["tutor", "feedback", "retention", "online", "gap", "sample"];

/** Bag-of-words vectors over a tiny vocabulary, enough for cosine ranking. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return [...VOCABULARY.map((word) => (lower.includes(word) ? 1 : 0)), 0.01];
}

export class KeywordEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "keyword";
  readonly dimensions = VOCABULARY.length + 1;
  batchCalls: string[][] = [];

  async embed(text: string): Promise<EmbeddingResult> {
    return this.result([keywordVector(text)]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.batchCalls.push(texts);
    return this.result(texts.map(keywordVector));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private result(embeddings: number[][]): EmbeddingResult {
    return { embeddings, model: "keyword", tokensUsed: 0, dimensions: this.dimensions };
  }
}

export class RecordingGenerator implements ITextGenerator {
  readonly model = "recording";
  prompts: Array<{ system: string; user: string }> = [];

  constructor(private readonly reply = "Generated answer.") {}

  async generate(system: string, user: string): Promise<string> {
    this.prompts.push({ system, user });
    return this.reply;
  }
}
