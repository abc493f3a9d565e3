import OpenAI from "openai";
import { ExternalServiceError } from "@studydesk/errors";
import type { IAnswerGenerator } from "./generator.interface.js";

const DEFAULT_MODEL = "gpt-3.5-turbo";

export interface OpenAIGeneratorConfig {
  apiKey: string;
  model?: string;
}

export class OpenAIAnswerGenerator implements IAnswerGenerator {
  readonly name = "openai";
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIGeneratorConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      messages: [{ role: "user", content: prompt }],
    });

    const content = completion.choices[0]?.message.content;
    if (content == null) {
      throw new ExternalServiceError("OpenAI returned no answer", this.name, {
        operation: "generator.generate",
      });
    }
    return content;
  }
}
