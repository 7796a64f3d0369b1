export interface PdfPage {
  readonly pageNumber: number;
  /** Text layer of the page, one line per `\n`. */
  extractText(): Promise<string>;
  /** Rasterise the page as a PNG at the given resolution. */
  renderImage(dpi: number): Promise<Uint8Array>;
}

export interface PdfDocument {
  readonly pageCount: number;
  /** PDF info dictionary (`Title`, `Author`, `CreationDate`, ...). */
  readonly info: Record<string, unknown>;
  getPage(pageNumber: number): Promise<PdfPage>;
  close(): Promise<void>;
}

export interface IPdfLoader {
  load(data: Uint8Array): Promise<PdfDocument>;
}

export interface IOcrEngine {
  readonly name: string;
  recognize(image: Uint8Array, lang: string): Promise<string>;
  terminate(): Promise<void>;
}
