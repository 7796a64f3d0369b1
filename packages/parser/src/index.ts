export type { IPdfLoader, IOcrEngine, PdfDocument, PdfPage } from "./parser.interface.js";
export { PdfjsLoader } from "./pdfjs-loader.js";
export { TesseractOcrEngine } from "./tesseract-ocr.js";
export type { TesseractOcrOptions } from "./tesseract-ocr.js";
export { extractPages, DEFAULT_PAGE_EXTRACTION_OPTIONS } from "./page-extractor.js";
export type {
  PageExtractionOptions,
  PageExtractionResult,
  PageExtractorDeps,
} from "./page-extractor.js";
export { resolveMetadata } from "./metadata-resolver.js";
