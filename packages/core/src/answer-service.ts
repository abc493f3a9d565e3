import type { AnswerResult } from "@studydesk/types";
import { ExternalServiceError, ValidationError, toAppError } from "@studydesk/errors";
import { buildPrompt, type IAnswerGenerator } from "@studydesk/generator";
import type { Logger } from "@studydesk/logger";
import type { HybridRetriever } from "./hybrid-retriever.js";

export interface AnswerDependencies {
  retriever: HybridRetriever;
  generator: IAnswerGenerator;
  logger: Logger;
}

/** Retrieve k chunks, format them with provenance and ask the generator. */
export async function answerQuestion(
  question: string,
  k: number,
  deps: AnswerDependencies,
): Promise<AnswerResult> {
  if (question.trim() === "") {
    throw new ValidationError("Question is empty", { question: "required" }, { operation: "answer" });
  }

  const chunks = await deps.retriever.retrieve(question, k);
  const context = deps.retriever.formatWithProvenance(chunks);
  deps.logger.debug({ chunks: chunks.length }, "Context assembled");

  try {
    const answer = await deps.generator.generate(buildPrompt(context, question));
    return { question, answer, context, chunks };
  } catch (err) {
    throw toAppError(
      err,
      (message, cause) =>
        new ExternalServiceError(`Answer generation failed: ${message}`, deps.generator.name, {
          operation: "answer",
          cause,
        }),
    );
  }
}
