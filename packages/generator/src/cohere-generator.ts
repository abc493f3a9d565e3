import { CohereClient } from "cohere-ai";
import { ExternalServiceError } from "@studydesk/errors";
import type { IAnswerGenerator } from "./generator.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";

export interface CohereGeneratorConfig {
  apiKey: string;
  model?: string;
}

export class CohereAnswerGenerator implements IAnswerGenerator {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;

  constructor(config: CohereGeneratorConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.client.v2.chat({
      model: this.model,
      temperature: 0,
      messages: [{ role: "user", content: prompt }],
    });

    const text = (response.message?.content ?? [])
      .map((item) => (item.type === "text" ? item.text : ""))
      .join("");

    if (!text) {
      throw new ExternalServiceError("Cohere returned no answer", this.name, {
        operation: "generator.generate",
      });
    }
    return text;
  }
}
