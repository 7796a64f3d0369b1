import { createHash, randomBytes } from "node:crypto";
import { parse } from "node:path";
import type { DocIdStrategy } from "@gapscout/types";

/**
 * `<basename without extension>_<8 hex chars>`. With the content strategy the
 * suffix is a SHA-256 prefix of the bytes, so re-ingesting the same file
 * reuses its chunk ids.
 */
export function createDocId(filename: string, data: Uint8Array, strategy: DocIdStrategy): string {
  const stem = parse(filename).name || "document";
  const suffix =
    strategy === "content"
      ? createHash("sha256").update(data).digest("hex").slice(0, 8)
      : randomBytes(4).toString("hex");
  return `${stem}_${suffix}`;
}
