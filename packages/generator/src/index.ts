export type { IAnswerGenerator } from "./generator.interface.js";
export { PROMPT_TEMPLATE, UNKNOWN_ANSWER, buildPrompt } from "./prompt.js";
export { OpenAIAnswerGenerator } from "./openai-generator.js";
export type { OpenAIGeneratorConfig } from "./openai-generator.js";
export { CohereAnswerGenerator } from "./cohere-generator.js";
export type { CohereGeneratorConfig } from "./cohere-generator.js";
export { createAnswerGenerator } from "./factory.js";
export type { GeneratorFactoryConfig } from "./factory.js";
