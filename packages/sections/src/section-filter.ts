import type { Section, SectionName } from "@gapscout/types";
import { DEFAULT_ALLOW_LIST } from "./heading-catalog.js";

/**
 * Keep the allow-listed sections in document order. A document with none of
 * them falls back to its `body` section; otherwise the result is empty.
 */
export function filterSections(
  sections: readonly Section[],
  allowList: ReadonlySet<SectionName> = DEFAULT_ALLOW_LIST,
): Section[] {
  const kept = sections.filter((section) => allowList.has(section.name));
  if (kept.length > 0) return kept;
  return sections.filter((section) => section.name === "body");
}
