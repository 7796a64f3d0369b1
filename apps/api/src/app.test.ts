import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "@gapscout/logger";
import { InMemoryVectorIndex } from "@gapscout/vector-store";
import {
  EchoOcrEngine,
  FakePdfLoader,
  KeywordEmbeddingProvider,
  RecordingGenerator,
  keywordVector,
} from "@gapscout/core/testing";
import { createApp, type AppOptions, type AppServices } from "./app.js";

const THREE_PAGES = ["Abstract\nThis paper studies X.", "Methods\nWe did Y.", "Conclusion\nX holds under Z."];

const OPTIONS: AppOptions = {
  cors: { origins: ["http://localhost:3000"] },
  ocr: { lang: "eng", minTextChars: 30 },
  ingestion: {
    chunkSize: 100,
    chunkOverlap: 0,
    dpi: 300,
    downloadTimeoutMs: 1000,
    docIdStrategy: "content",
    maxUploadMb: 1,
  },
  retrieval: { maxSourceChars: 4000 },
  collectionName: "edu_books",
};

let server: Server | undefined;

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve) => running.close(() => resolve()));
  }
});

function buildServices(overrides: Partial<AppServices> = {}): AppServices {
  return {
    logger: createLogger({ level: "silent", pretty: false }),
    pdfLoader: new FakePdfLoader(THREE_PAGES),
    ocr: new EchoOcrEngine(),
    embeddingProvider: new KeywordEmbeddingProvider(),
    vectorIndex: new InMemoryVectorIndex(),
    generator: new RecordingGenerator(),
    ...overrides,
  };
}

async function start(services: AppServices): Promise<string> {
  const app = createApp(services, OPTIONS);
  const listening = app.listen(0, "127.0.0.1");
  server = listening;
  await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server did not bind a TCP port");
  }
  const { port }: AddressInfo = address;
  return `http://127.0.0.1:${String(port)}`;
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

async function seededIndex(): Promise<InMemoryVectorIndex> {
  const index = new InMemoryVectorIndex();
  const texts = ["Online tutor feedback improved retention.", "Tutor training varied between sites."];
  await index.upsert("edu_books", {
    ids: ["notes_1_chunk_0", "notes_1_chunk_1"],
    documents: texts,
    embeddings: texts.map(keywordVector),
    metadatas: [{ section: "abstract" }, { section: "discussion" }],
  });
  return index;
}

describe("GET /health", () => {
  it("reports ok and assigns a request id", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(await res.json()).toEqual({ success: true, data: { ok: true } });
  });

  it("echoes the caller's request id", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/health`, { headers: { "x-request-id": "req-abc" } });

    expect(res.headers.get("x-request-id")).toBe("req-abc");
  });
});

describe("GET /health/ready", () => {
  it("reports each dependency", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/health/ready`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: { ok: true, vectorIndex: true, embeddings: true },
    });
  });

  it("answers 503 when a dependency is down", async () => {
    const vectorIndex = new InMemoryVectorIndex();
    vi.spyOn(vectorIndex, "healthCheck").mockResolvedValueOnce(false);
    const base = await start(buildServices({ vectorIndex }));

    const res = await fetch(`${base}/health/ready`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      success: true,
      data: { ok: false, vectorIndex: false, embeddings: true },
    });
  });
});

describe("POST /ask and /gaps", () => {
  it("answers from the nearest passages", async () => {
    const generator = new RecordingGenerator("Feedback helps.");
    const base = await start(buildServices({ generator, vectorIndex: await seededIndex() }));

    const res = await postJson(`${base}/ask`, { question: "Does tutor feedback help retention?", top_k: 1 });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: {
        question: "Does tutor feedback help retention?",
        answer: "Feedback helps.",
        sources: [
          {
            id: "notes_1_chunk_0",
            document: "Online tutor feedback improved retention.",
            metadata: { section: "abstract" },
            distance: expect.any(Number),
          },
        ],
      },
    });
    expect(generator.prompts[0]?.system).not.toContain("Identify potential research gaps");
  });

  it("uses the research-gap prompt for /gaps and defaults top_k to 3", async () => {
    const generator = new RecordingGenerator("Gaps: long-term effects.");
    const base = await start(buildServices({ generator, vectorIndex: await seededIndex() }));

    const res = await postJson(`${base}/gaps`, { question: "What is missing on tutor feedback and retention?" });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ success: true, data: { answer: "Gaps: long-term effects." } });
    expect(generator.prompts[0]?.system).toContain("Identify potential research gaps");
    expect(generator.prompts[0]?.user).toContain("[Source 2]\nTutor training varied between sites.");
  });

  it("rejects top_k outside 1..10 with a validation envelope", async () => {
    const base = await start(buildServices());

    const res = await postJson(`${base}/ask`, { question: "gap?", top_k: 11 }, { "x-request-id": "req-11" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      success: false,
      error: { code: "VALIDATION_ERROR", requestId: "req-11", details: { issues: [{ path: "top_k" }] } },
    });
  });

  it("rejects an empty question", async () => {
    const base = await start(buildServices());

    const res = await postJson(`${base}/ask`, { question: "" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: { code: "VALIDATION_ERROR" } });
  });

  it("maps unexpected failures to INTERNAL_ERROR without leaking the message", async () => {
    const generator = new RecordingGenerator();
    vi.spyOn(generator, "generate").mockRejectedValueOnce(new Error("upstream exploded"));
    const base = await start(buildServices({ generator }));

    const res = await postJson(`${base}/ask`, { question: "Anything?" });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      success: false,
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("answers 400 for a malformed JSON body", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/ask`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: { code: "BAD_REQUEST" } });
  });
});

describe("POST /ingest/pdf", () => {
  it("ingests an uploaded PDF into the requested collection", async () => {
    const vectorIndex = new InMemoryVectorIndex();
    const base = await start(buildServices({ vectorIndex }));

    const res = await fetch(`${base}/ingest/pdf?filename=paper.pdf&collection=pilot`, {
      method: "POST",
      headers: { "content-type": "application/pdf" },
      body: new Uint8Array([37, 80, 68, 70]),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        ok: true,
        pdf: "paper.pdf",
        pages: 3,
        sectionsDetected: ["abstract", "methods", "conclusion"],
        sectionsIndexed: ["abstract", "conclusion"],
        chunks: 2,
        embedded: 2,
        collection: "pilot",
      },
    });
    expect(vectorIndex.size("pilot")).toBe(2);
  });

  it("rejects a request without a PDF body", async () => {
    const base = await start(buildServices());

    const res = await postJson(`${base}/ingest/pdf`, { file: "paper.pdf" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      success: false,
      error: { code: "VALIDATION_ERROR", details: { fields: { body: "missing" } } },
    });
  });

  it("rejects an overlap that is not smaller than the chunk size", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/ingest/pdf?chunk_size=50&chunk_overlap=50`, {
      method: "POST",
      headers: { "content-type": "application/pdf" },
      body: new Uint8Array([37, 80, 68, 70]),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      success: false,
      error: { code: "VALIDATION_ERROR", message: "chunkOverlap must be smaller than chunkSize" },
    });
  });
});

describe("POST /ingest/url", () => {
  it("downloads and ingests the PDF with the default collection", async () => {
    const download = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(new Uint8Array([37, 80, 68, 70]), { status: 200 }),
    );
    const base = await start(buildServices({ fetch: download }));

    const res = await postJson(`${base}/ingest/url`, { url: "https://papers.example.org/files/study.pdf" });

    expect(res.status).toBe(200);
    expect(download).toHaveBeenCalledTimes(1);
    expect(await res.json()).toMatchObject({
      success: true,
      data: { pdf: "study.pdf", chunks: 2, collection: "edu_books" },
    });
  });

  it("reports an unreachable source as 422 SOURCE_UNAVAILABLE", async () => {
    const download = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response("gone", { status: 404 }),
    );
    const base = await start(buildServices({ fetch: download }));

    const res = await postJson(`${base}/ingest/url`, { url: "https://papers.example.org/missing.pdf" });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      success: false,
      error: {
        code: "SOURCE_UNAVAILABLE",
        details: { url: "https://papers.example.org/missing.pdf", status: 404 },
      },
    });
  });
});

describe("unknown routes", () => {
  it("answer with a NOT_FOUND envelope", async () => {
    const base = await start(buildServices());

    const res = await fetch(`${base}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ success: false, error: { code: "NOT_FOUND" } });
  });
});
