export type SectionName =
  | "abstract"
  | "introduction"
  | "background"
  | "related work"
  | "methods"
  | "results"
  | "discussion"
  | "conclusion"
  | "limitations"
  | "future work"
  | "body";

export interface Section {
  name: SectionName;
  text: string;
  pageStart: number;
  pageEnd: number;
}

export interface HeadingPattern {
  name: SectionName;
  pattern: RegExp;
}
