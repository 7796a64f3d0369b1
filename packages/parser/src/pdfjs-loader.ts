import { dirname, join } from "node:path";
import { createRequire } from "node:module";
import { createCanvas } from "@napi-rs/canvas";
import {
  getDocument,
  type PDFDocumentProxy,
  type PDFPageProxy,
} from "pdfjs-dist/legacy/build/pdf.mjs";
import { ValidationError } from "@gapscout/errors";
import type { IPdfLoader, PdfDocument, PdfPage } from "./parser.interface.js";

const POINTS_PER_INCH = 72;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Directory of pdfjs-dist's bundled assets. In Node the font and wasm
 * factories read from the filesystem, so these are plain paths with a
 * trailing separator.
 */
function pdfjsAssetDir(name: "standard_fonts" | "wasm"): string {
  const require = createRequire(import.meta.url);
  const packageRoot = dirname(require.resolve("pdfjs-dist/package.json"));
  return `${join(packageRoot, name)}/`;
}

class PdfjsPage implements PdfPage {
  constructor(private readonly page: PDFPageProxy) {}

  get pageNumber(): number {
    return this.page.pageNumber;
  }

  async extractText(): Promise<string> {
    const content = await this.page.getTextContent();
    let text = "";

    for (const item of content.items) {
      if (!("str" in item)) continue;
      text += item.str;
      if (item.hasEOL) text += "\n";
    }

    return text;
  }

  async renderImage(dpi: number): Promise<Uint8Array> {
    const viewport = this.page.getViewport({ scale: dpi / POINTS_PER_INCH });
    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
    const renderParams = { canvas, canvasContext: canvas.getContext("2d"), viewport };

    await this.page.render(renderParams).promise;
    return canvas.toBuffer("image/png");
  }
}

class PdfjsDocument implements PdfDocument {
  constructor(
    private readonly doc: PDFDocumentProxy,
    readonly info: Record<string, unknown>,
  ) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPage(pageNumber: number): Promise<PdfPage> {
    return new PdfjsPage(await this.doc.getPage(pageNumber));
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

/**
 * PDF access through pdfjs-dist's Node (legacy) build. Text comes from the
 * page text layer; rasterisation uses @napi-rs/canvas for OCR input.
 */
export class PdfjsLoader implements IPdfLoader {
  async load(data: Uint8Array): Promise<PdfDocument> {
    // pdfjs transfers the buffer to its worker, so hand it a copy.
    const loadingTask = getDocument({
      data: new Uint8Array(data),
      standardFontDataUrl: pdfjsAssetDir("standard_fonts"),
      wasmUrl: pdfjsAssetDir("wasm"),
      isEvalSupported: false,
      verbosity: 0,
    });

    let doc: PDFDocumentProxy;
    try {
      doc = await loadingTask.promise;
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError("File is not a readable PDF", { file: reason });
    }

    const metadata = await doc.getMetadata().catch(() => null);
    const info = metadata && isRecord(metadata.info) ? metadata.info : {};

    return new PdfjsDocument(doc, info);
  }
}
