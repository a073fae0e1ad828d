import OpenAI from "openai";

import { MatcherError, errorMessage } from "./errors";
import { renderPrompt } from "./prompt_loader";

export interface Generator {
  generate(symptom: string, details: string, context: string): Promise<string>;
}

/**
 * One non-streaming chat completion per call, no retry.
 */
export class OpenAIGenerator implements Generator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly template: string;

  constructor(params: { apiKey: string; model: string; template: string; temperature?: number; client?: OpenAI }) {
    this.client = params.client ?? new OpenAI({ apiKey: params.apiKey });
    this.model = params.model;
    this.temperature = params.temperature ?? 0;
    this.template = params.template;
  }

  async generate(symptom: string, details: string, context: string): Promise<string> {
    const prompt = renderPrompt(this.template, { symptom, details, context });
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [{ role: "user", content: prompt }],
      });
      return completion.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw new MatcherError({
        code: "GENERATION_FAILED",
        stage: "GENERATE",
        message: errorMessage(error),
        cause: error,
      });
    }
  }
}
