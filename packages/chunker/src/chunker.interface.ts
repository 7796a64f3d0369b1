/** Splits text into passages, preferring the largest natural boundary that fits. */
export interface ITextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  split(text: string): string[];
}
