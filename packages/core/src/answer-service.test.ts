import { afterEach, describe, expect, it } from "vitest";
import { rm } from "node:fs/promises";
import { ExternalServiceError, ValidationError } from "@studydesk/errors";
import type { IAnswerGenerator } from "@studydesk/generator";
import { createSilentLogger } from "@studydesk/logger";
import { LocalVectorStore } from "@studydesk/vector-store";
import { answerQuestion } from "./answer-service.js";
import { HybridRetriever } from "./hybrid-retriever.js";
import { FakeEmbeddings, makeTempDir } from "./test-helpers.js";

class RecordingGenerator implements IAnswerGenerator {
  readonly name = "recording";
  prompts: string[] = [];
  error: Error | undefined;

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.error) throw this.error;
    return "Entropy rises.";
  }
}

const roots: string[] = [];

async function setup() {
  const root = await makeTempDir();
  roots.push(root);
  const store = new LocalVectorStore(root);
  const embeddings = new FakeEmbeddings();
  await store.createCollection("base", embeddings.dimensions, [
    {
      id: "c1",
      vector: [1, 0, 0, 0],
      content: "entropy always rises",
      payload: { sourceType: "base", source: "/course/thermo.pdf", pageNumber: 2, startChar: 0, endChar: 20 },
    },
  ]);
  const retriever = new HybridRetriever({
    vectorStore: store,
    embeddings,
    logger: createSilentLogger(),
    baseCollection: "base",
    userCollection: "user",
  });
  const generator = new RecordingGenerator();
  return { retriever, generator, logger: createSilentLogger() };
}

describe("answerQuestion", () => {
  afterEach(async () => {
    await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
  });

  it("sends the formatted context and question to the generator", async () => {
    const deps = await setup();

    const result = await answerQuestion("What does entropy do?", 3, deps);

    expect(result.answer).toBe("Entropy rises.");
    expect(result.context).toBe("[1] course material: thermo.pdf, page 2\nentropy always rises");
    expect(result.chunks).toHaveLength(1);
    expect(deps.generator.prompts[0]).toContain(
      "Context:\n[1] course material: thermo.pdf, page 2\nentropy always rises\n\nQuestion:\nWhat does entropy do?\n",
    );
  });

  it("still asks the generator when nothing is retrieved", async () => {
    const deps = await setup();

    const result = await answerQuestion("What does entropy do?", 0, deps);

    expect(result.context).toBe("");
    expect(deps.generator.prompts).toHaveLength(1);
  });

  it("rejects an empty question", async () => {
    const deps = await setup();

    await expect(answerQuestion("   ", 3, deps)).rejects.toBeInstanceOf(ValidationError);
    expect(deps.generator.prompts).toEqual([]);
  });

  it("wraps generator failures", async () => {
    const deps = await setup();
    deps.generator.error = new Error("rate limited");

    const error = await answerQuestion("What does entropy do?", 3, deps).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ message: "Answer generation failed: rate limited", service: "recording" });
  });
});
