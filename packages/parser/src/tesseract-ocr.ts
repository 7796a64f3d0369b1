import Tesseract from "tesseract.js";
import type { IOcrEngine } from "./parser.interface.js";

export interface TesseractOcrOptions {
  /** Directory or URL holding `<lang>.traineddata`; tesseract.js fetches from its CDN when unset. */
  langPath?: string;
}

/**
 * OCR through tesseract.js. One worker per language, created on first use
 * and kept until {@link terminate}.
 */
export class TesseractOcrEngine implements IOcrEngine {
  readonly name = "tesseract";
  private readonly workers = new Map<string, Promise<Tesseract.Worker>>();

  constructor(private readonly options: TesseractOcrOptions = {}) {}

  async recognize(image: Uint8Array, lang: string): Promise<string> {
    const worker = await this.getWorker(lang);
    const { data } = await worker.recognize(Buffer.from(image));
    return data.text;
  }

  async terminate(): Promise<void> {
    const pending = [...this.workers.values()];
    this.workers.clear();

    await Promise.all(
      pending.map(async (workerPromise) => {
        const worker = await workerPromise;
        await worker.terminate();
      }),
    );
  }

  private getWorker(lang: string): Promise<Tesseract.Worker> {
    let worker = this.workers.get(lang);
    if (!worker) {
      worker = Tesseract.createWorker(
        lang,
        undefined,
        this.options.langPath ? { langPath: this.options.langPath } : {},
      );
      // Forget a worker that failed to start; the next call creates a new one.
      void worker.catch(() => this.workers.delete(lang));
      this.workers.set(lang, worker);
    }
    return worker;
  }
}
