import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { DocumentSource } from "@gapscout/types";
import { NotFoundError, SourceUnavailableError, ValidationError } from "@gapscout/errors";

const FALLBACK_FILENAME = "document.pdf";

export interface LoadedDocument {
  filename: string;
  data: Uint8Array;
}

export interface SourceLoaderOptions {
  downloadTimeoutMs: number;
  fetch?: typeof fetch;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Last path segment of a URL, or a generic name when the path has none. */
export function filenameFromUrl(url: URL): string {
  const segment = url.pathname.split("/").filter(Boolean).at(-1);
  if (!segment) return FALLBACK_FILENAME;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

async function download(rawUrl: string, options: SourceLoaderOptions): Promise<LoadedDocument> {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new ValidationError("Invalid URL", { url: rawUrl });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError("Only http and https URLs can be ingested", { url: rawUrl });
  }

  const fetchImpl = options.fetch ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(options.downloadTimeoutMs) });
  } catch (err: unknown) {
    const timedOut = err instanceof Error && err.name === "TimeoutError";
    throw new SourceUnavailableError(
      timedOut
        ? `Download timed out after ${String(options.downloadTimeoutMs)}ms`
        : `Download failed: ${err instanceof Error ? err.message : String(err)}`,
      rawUrl,
    );
  }

  if (!response.ok) {
    throw new SourceUnavailableError(
      `Download failed with status ${String(response.status)}`,
      rawUrl,
      response.status,
    );
  }

  return { filename: filenameFromUrl(url), data: new Uint8Array(await response.arrayBuffer()) };
}

/** Resolve a document source to its bytes and the filename used for ids and metadata. */
export async function loadSource(
  source: DocumentSource,
  options: SourceLoaderOptions,
): Promise<LoadedDocument> {
  switch (source.kind) {
    case "buffer":
      return { filename: source.filename || FALLBACK_FILENAME, data: source.data };
    case "file":
      try {
        return { filename: basename(source.path), data: new Uint8Array(await readFile(source.path)) };
      } catch (err: unknown) {
        if (isMissingFile(err)) throw new NotFoundError(`PDF not found: ${source.path}`);
        throw err;
      }
    case "url":
      return download(source.url, options);
  }
}
