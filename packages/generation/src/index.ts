export type { ITextGenerator } from "./text-generator.interface.js";
export { AiTextGenerator, createTextGenerator, DEFAULT_SAMPLING } from "./ai-text-generator.js";
export type { SamplingOptions } from "./ai-text-generator.js";
export { stripReasoning } from "./strip-reasoning.js";
