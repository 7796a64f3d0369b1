import type { Page, RawDocument } from "@gapscout/types";
import type { Logger } from "@gapscout/logger";
import type { IOcrEngine, IPdfLoader, PdfPage } from "./parser.interface.js";

export interface PageExtractionOptions {
  /** Render resolution for scanned pages. */
  dpi: number;
  ocrLang: string;
  /** Pages whose direct text is shorter than this are sent to OCR. */
  minTextChars: number;
}

export interface PageExtractorDeps {
  loader: IPdfLoader;
  ocr: IOcrEngine;
  logger: Logger;
}

export interface PageExtractionResult {
  pages: Page[];
  document: RawDocument;
}

export const DEFAULT_PAGE_EXTRACTION_OPTIONS: PageExtractionOptions = {
  dpi: 300,
  ocrLang: "eng",
  minTextChars: 30,
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function directText(page: PdfPage, logger: Logger): Promise<string> {
  try {
    return (await page.extractText()).trim();
  } catch (err: unknown) {
    logger.warn({ page: page.pageNumber, err: errorMessage(err) }, "Text extraction failed");
    return "";
  }
}

async function ocrText(
  page: PdfPage,
  options: PageExtractionOptions,
  deps: PageExtractorDeps,
): Promise<string | null> {
  try {
    const image = await page.renderImage(options.dpi);
    return (await deps.ocr.recognize(image, options.ocrLang)).trim();
  } catch (err: unknown) {
    deps.logger.warn({ page: page.pageNumber, err: errorMessage(err) }, "OCR failed");
    return null;
  }
}

/**
 * Read every page of a PDF in order. Pages with too little embedded text are
 * rendered and OCR'd once; a page that fails either step keeps whatever text
 * it already has, and a page that cannot be opened at all is kept as empty
 * text. The document is closed before returning.
 */
export async function extractPages(
  data: Uint8Array,
  options: PageExtractionOptions,
  deps: PageExtractorDeps,
): Promise<PageExtractionResult> {
  const doc = await deps.loader.load(data);
  const pages: Page[] = [];
  let ocrPages = 0;

  try {
    for (let pageNumber = 1; pageNumber <= doc.pageCount; pageNumber++) {
      let page: PdfPage;
      try {
        page = await doc.getPage(pageNumber);
      } catch (err: unknown) {
        deps.logger.warn({ page: pageNumber, err: errorMessage(err) }, "Page could not be opened");
        pages.push({ index: pageNumber, text: "" });
        continue;
      }

      let text = await directText(page, deps.logger);

      if (text.length < options.minTextChars) {
        const recognized = await ocrText(page, options, deps);
        if (recognized !== null) {
          text = recognized;
          ocrPages++;
        }
      }

      pages.push({ index: pageNumber, text });
    }
  } finally {
    await doc.close();
  }

  deps.logger.debug({ pages: pages.length, ocrPages }, "Pages extracted");

  return {
    pages,
    document: { pageCount: doc.pageCount, info: doc.info },
  };
}
