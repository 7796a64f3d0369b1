export { segmentSections } from "./segmenter.js";
export { filterSections } from "./section-filter.js";
export { BACK_MATTER_PATTERN, DEFAULT_HEADINGS, DEFAULT_ALLOW_LIST } from "./heading-catalog.js";
