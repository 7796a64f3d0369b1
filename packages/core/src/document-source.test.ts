import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import { NotFoundError, SourceUnavailableError, ValidationError } from "@gapscout/errors";
import { filenameFromUrl, loadSource } from "./document-source.js";
import { createDocId } from "./doc-id.js";

const PDF_BYTES = new Uint8Array([37, 80, 68, 70, 45, 49, 46, 55]);

function fetchReturning(response: Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response);
}

describe("loadSource", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "gapscout-source-"));
    await writeFile(join(dir, "lecture.pdf"), PDF_BYTES);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("passes buffers through", async () => {
    const loaded = await loadSource(
      { kind: "buffer", filename: "upload.pdf", data: PDF_BYTES },
      { downloadTimeoutMs: 1000 },
    );
    expect(loaded).toEqual({ filename: "upload.pdf", data: PDF_BYTES });
  });

  it("reads files from disk", async () => {
    const loaded = await loadSource({ kind: "file", path: join(dir, "lecture.pdf") }, { downloadTimeoutMs: 1000 });

    expect(loaded.filename).toBe("lecture.pdf");
    expect(Array.from(loaded.data)).toEqual(Array.from(PDF_BYTES));
  });

  it("raises NotFoundError for a missing file", async () => {
    await expect(
      loadSource({ kind: "file", path: join(dir, "missing.pdf") }, { downloadTimeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("downloads URLs in memory", async () => {
    const fetchMock = fetchReturning(new Response(PDF_BYTES, { status: 200 }));

    const loaded = await loadSource(
      { kind: "url", url: "https://papers.example.org/files/gap%20study.pdf" },
      { downloadTimeoutMs: 1000, fetch: fetchMock },
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(loaded.filename).toBe("gap study.pdf");
    expect(Array.from(loaded.data)).toEqual(Array.from(PDF_BYTES));
  });

  it("raises SourceUnavailableError with the status for a non-2xx response", async () => {
    const fetchMock = fetchReturning(new Response("missing", { status: 404 }));

    const error = await loadSource(
      { kind: "url", url: "https://papers.example.org/missing.pdf" },
      { downloadTimeoutMs: 1000, fetch: fetchMock },
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      statusCode: 422,
      code: "SOURCE_UNAVAILABLE",
      url: "https://papers.example.org/missing.pdf",
      status: 404,
    });
  });

  it("raises SourceUnavailableError on a network failure", async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      loadSource({ kind: "url", url: "https://papers.example.org/a.pdf" }, { downloadTimeoutMs: 1000, fetch: fetchMock }),
    ).rejects.toThrow("Download failed: fetch failed");
  });

  it("raises SourceUnavailableError when the download times out", async () => {
    const fetchMock = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signal.addEventListener("abort", () => {
              reject(signal.reason);
            });
          }
        }),
    );

    await expect(
      loadSource({ kind: "url", url: "https://papers.example.org/slow.pdf" }, { downloadTimeoutMs: 20, fetch: fetchMock }),
    ).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("rejects malformed and non-http URLs", async () => {
    await expect(
      loadSource({ kind: "url", url: "not a url" }, { downloadTimeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      loadSource({ kind: "url", url: "file:///etc/hosts" }, { downloadTimeoutMs: 1000 }),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("filenameFromUrl", () => {
  it("falls back to a generic name when the path is empty", () => {
    expect(filenameFromUrl(new URL("https://papers.example.org/"))).toBe("document.pdf");
  });

  it("ignores the query string", () => {
    expect(filenameFromUrl(new URL("https://papers.example.org/a/b/study.pdf?download=1"))).toBe("study.pdf");
  });
});

describe("createDocId", () => {
  it("is stable for the same bytes with the content strategy", () => {
    const first = createDocId("study.pdf", PDF_BYTES, "content");
    expect(first).toMatch(/^study_[0-9a-f]{8}$/);
    expect(createDocId("study.pdf", PDF_BYTES, "content")).toBe(first);
    expect(createDocId("study.pdf", new Uint8Array([1]), "content")).not.toBe(first);
  });

  it("strips only the last extension", () => {
    expect(createDocId("notes.v2.pdf", PDF_BYTES, "random")).toMatch(/^notes\.v2_[0-9a-f]{8}$/);
  });

  it("uses a generic stem for an empty filename", () => {
    expect(createDocId("", PDF_BYTES, "random")).toMatch(/^document_[0-9a-f]{8}$/);
  });
});
