import type { AnswerMode } from "@gapscout/types";

export interface Prompt {
  system: string;
  user: string;
}

const SHARED_RULES = [
  "Rules:",
  "- Use ONLY the provided context; if needed information is missing, say you don't have enough information.",
  "- Do NOT include your chain-of-thought, hidden analysis, or step-by-step reasoning. Return the final answer only.",
  "- Be concise, specific, and cite which parts of the context you're using (e.g., 'From Source 2').",
].join("\n");

const SYSTEM_PROMPTS: Record<AnswerMode, string> = {
  qa: [
    "You are a careful research assistant. Answer the question using the provided excerpts from academic papers.",
    SHARED_RULES,
  ].join("\n"),
  gaps: [
    "You are a diligent Researcher. Your tasks:",
    "1) Explain the provided research content in clear, simple language.",
    "2) Identify potential research gaps, limitations, and future directions explicitly from the context.",
    SHARED_RULES,
  ].join("\n"),
};

const ANSWER_FORMATS: Record<AnswerMode, string> = {
  qa: [
    "Required format (adapt as needed):",
    "- A direct answer in 1-3 sentences.",
    "- Up to 5 supporting bullets, each naming its source.",
    "- If information is insufficient, state explicitly what is missing.",
  ].join("\n"),
  gaps: [
    "Required format (adapt as needed):",
    "1) Plain-English Explanation:",
    "- <2-5 short bullets that summarize the key points relevant to the question>",
    "2) Potential Research Gaps (based on the context):",
    "- <bullet list of concrete, testable gaps or open directions>",
    "3) If information is insufficient:",
    "- State explicitly what is missing from the context to answer.",
  ].join("\n"),
};

export function buildPrompt(mode: AnswerMode, question: string, context: string): Prompt {
  return {
    system: SYSTEM_PROMPTS[mode],
    user: `Context:\n${context}\n\nQuestion:\n${question}\n\n${ANSWER_FORMATS[mode]}\n`,
  };
}
