export type { ITextSplitter } from "./chunker.interface.js";
export { RecursiveTextSplitter, DEFAULT_SEPARATORS } from "./recursive-text-splitter.js";
export { chunkSections } from "./section-chunker.js";
