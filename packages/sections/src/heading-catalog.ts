import type { HeadingPattern, SectionName } from "@gapscout/types";

/** Everything from the first matching line onward is dropped before segmentation. */
export const BACK_MATTER_PATTERN =
  /^\s*(references|bibliography|works\s+cited|acknowledge?ments?)\b/i;

const TRAILER = String.raw`\b[:.\s]*`;

function heading(name: SectionName, alternatives: string): HeadingPattern {
  return { name, pattern: new RegExp(String.raw`^\s*(?:${alternatives})${TRAILER}`, "i") };
}

/** Recognised section headings, in precedence order. */
export const DEFAULT_HEADINGS: readonly HeadingPattern[] = [
  heading("abstract", "abstract"),
  heading("introduction", "introduction"),
  heading("background", "background"),
  heading("related work", String.raw`related\s+work`),
  heading("methods", "methods?|methodology"),
  heading("results", "results?"),
  heading("discussion", "discussion"),
  heading("conclusion", "conclusions?"),
  heading("limitations", "limitations?"),
  heading("future work", String.raw`future\s+work|future\s+directions|further\s+work`),
];

/** Sections worth indexing for gap analysis. */
export const DEFAULT_ALLOW_LIST: ReadonlySet<SectionName> = new Set<SectionName>([
  "abstract",
  "introduction",
  "conclusion",
  "future work",
  "limitations",
  "discussion",
]);
