import type { GeneratorProviderType } from "@studydesk/types";
import type { IAnswerGenerator } from "./generator.interface.js";
import { OpenAIAnswerGenerator, type OpenAIGeneratorConfig } from "./openai-generator.js";
import { CohereAnswerGenerator, type CohereGeneratorConfig } from "./cohere-generator.js";

export interface GeneratorFactoryConfig {
  provider: GeneratorProviderType;
  openai?: OpenAIGeneratorConfig;
  cohere?: CohereGeneratorConfig;
}

export function createAnswerGenerator(config: GeneratorFactoryConfig): IAnswerGenerator {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIAnswerGenerator(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereAnswerGenerator(config.cohere);
    default:
      throw new Error(`Unknown generator provider: ${String(config.provider)}`);
  }
}
