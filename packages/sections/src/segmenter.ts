import type { HeadingPattern, Page, Section, SectionName } from "@gapscout/types";
import { BACK_MATTER_PATTERN, DEFAULT_HEADINGS } from "./heading-catalog.js";

interface Line {
  page: number;
  text: string;
}

interface HeadingMatch {
  lineIndex: number;
  name: SectionName;
  /** Length of the matched heading prefix on that line. */
  prefixLength: number;
}

/** Lines of a page; a trailing newline does not produce an extra empty line. */
function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function flatten(pages: readonly Page[]): Line[] {
  return pages.flatMap((page) => splitLines(page.text).map((text) => ({ page: page.index, text })));
}

function cutBackMatter(lines: Line[]): Line[] {
  const cut = lines.findIndex((line) => BACK_MATTER_PATTERN.test(line.text));
  return cut === -1 ? lines : lines.slice(0, cut);
}

function findHeadings(lines: Line[], catalog: readonly HeadingPattern[]): HeadingMatch[] {
  const matches: HeadingMatch[] = [];

  lines.forEach((line, lineIndex) => {
    for (const { name, pattern } of catalog) {
      const match = pattern.exec(line.text);
      if (match && match.index === 0) {
        matches.push({ lineIndex, name, prefixLength: match[0].length });
        return;
      }
    }
  });

  return matches;
}

function pageRange(lines: Line[]): { pageStart: number; pageEnd: number } {
  let pageStart = Infinity;
  let pageEnd = -Infinity;
  for (const { page } of lines) {
    if (page < pageStart) pageStart = page;
    if (page > pageEnd) pageEnd = page;
  }
  return { pageStart, pageEnd };
}

function joinLines(lines: Line[]): string {
  return lines
    .map((line) => line.text)
    .join("\n")
    .trim();
}

/**
 * Split a document's pages into named sections.
 *
 * Back matter (references, bibliography, works cited, acknowledgments) and
 * everything after it is discarded. Each line matching a catalog heading opens
 * a section that runs until the next heading; text before the first heading is
 * not part of any section. A document without headings yields a single
 * `body` section. The first catalog entry that matches a line wins.
 */
export function segmentSections(
  pages: readonly Page[],
  catalog: readonly HeadingPattern[] = DEFAULT_HEADINGS,
): Section[] {
  const lines = cutBackMatter(flatten(pages));
  const headings = findHeadings(lines, catalog);

  if (headings.length === 0) {
    const text = joinLines(lines);
    return text ? [{ name: "body", text, ...pageRange(lines) }] : [];
  }

  const sections: Section[] = [];

  headings.forEach((heading, k) => {
    const end = headings[k + 1]?.lineIndex ?? lines.length;
    const sectionLines = lines.slice(heading.lineIndex, end);
    const [headingLine, ...bodyLines] = sectionLines;
    if (!headingLine) return;

    const afterHeading = headingLine.text.slice(heading.prefixLength);
    const hasContent =
      afterHeading.trim().length > 0 || bodyLines.some((line) => line.text.trim().length > 0);
    if (!hasContent) return;

    sections.push({ name: heading.name, text: joinLines(sectionLines), ...pageRange(sectionLines) });
  });

  return sections;
}
