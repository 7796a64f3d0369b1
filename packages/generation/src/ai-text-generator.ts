import { generateText, type LanguageModel } from "ai";
import { createGroq } from "@ai-sdk/groq";
import type { GenerationSettings } from "@gapscout/types";
import type { ITextGenerator } from "./text-generator.interface.js";
import { stripReasoning } from "./strip-reasoning.js";

export interface SamplingOptions {
  temperature: number;
  topP: number;
  maxTokens: number;
}

export const DEFAULT_SAMPLING: SamplingOptions = {
  temperature: 0.2,
  topP: 0.95,
  maxTokens: 1024,
};

/** Single-turn generation through any AI SDK language model. */
export class AiTextGenerator implements ITextGenerator {
  readonly model: string;

  constructor(
    private readonly languageModel: LanguageModel,
    private readonly sampling: SamplingOptions = DEFAULT_SAMPLING,
  ) {
    this.model = languageModel.modelId;
  }

  async generate(system: string, user: string): Promise<string> {
    const { text } = await generateText({
      model: this.languageModel,
      system,
      prompt: user,
      temperature: this.sampling.temperature,
      topP: this.sampling.topP,
      maxTokens: this.sampling.maxTokens,
    });

    return stripReasoning(text);
  }
}

export function createTextGenerator(settings: GenerationSettings): ITextGenerator {
  const groq = createGroq({ apiKey: settings.groqApiKey });
  return new AiTextGenerator(groq(settings.model));
}
