import { beforeEach, describe, expect, it, vi } from "vitest";
import { ExternalServiceError } from "@studydesk/errors";
import { buildPrompt, PROMPT_TEMPLATE, UNKNOWN_ANSWER } from "./prompt.js";
import { createAnswerGenerator } from "./factory.js";
import { OpenAIAnswerGenerator } from "./openai-generator.js";
import { CohereAnswerGenerator } from "./cohere-generator.js";

const { completionsCreate, cohereChat } = vi.hoisted(() => ({
  completionsCreate: vi.fn(),
  cohereChat: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: completionsCreate } };
  },
}));

vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { chat: cohereChat };
  },
}));

describe("buildPrompt", () => {
  it("fills context and question into the fixed template", () => {
    const prompt = buildPrompt("[1] course material: a.pdf, page 1\nEntropy rises.", "What rises?");

    expect(prompt).toBe(
      [
        "You are a helpful assistant.",
        "Answer the question using ONLY the Context below.",
        `If the answer is not in the Context, say "${UNKNOWN_ANSWER}"`,
        "",
        "Context:",
        "[1] course material: a.pdf, page 1",
        "Entropy rises.",
        "",
        "Question:",
        "What rises?",
        "",
      ].join("\n"),
    );
  });

  it("keeps replacement patterns in user text literal", () => {
    expect(buildPrompt("costs $& more", "why $1?")).toContain("costs $& more");
    expect(buildPrompt("ctx", "why $1?")).toContain("Question:\nwhy $1?\n");
  });

  it("leaves placeholders inside the context untouched", () => {
    const prompt = buildPrompt("Write {question} in the form field.", "What goes in the field?");

    expect(prompt).toContain("Context:\nWrite {question} in the form field.\n");
    expect(prompt).toContain("Question:\nWhat goes in the field?\n");
  });

  it("instructs the model to admit missing context", () => {
    expect(PROMPT_TEMPLATE).toContain("I don't know based on the provided context.");
  });
});

describe("answer generators", () => {
  beforeEach(() => {
    completionsCreate.mockReset();
    cohereChat.mockReset();
  });

  it("creates the configured generator", () => {
    expect(createAnswerGenerator({ provider: "openai", openai: { apiKey: "test-key" } })).toBeInstanceOf(
      OpenAIAnswerGenerator,
    );
    expect(createAnswerGenerator({ provider: "cohere", cohere: { apiKey: "test-key" } })).toBeInstanceOf(
      CohereAnswerGenerator,
    );
    expect(() => createAnswerGenerator({ provider: "cohere" })).toThrow("Cohere config is required");
  });

  it("calls OpenAI at temperature 0 and returns the answer verbatim", async () => {
    completionsCreate.mockResolvedValue({ choices: [{ message: { content: "  Entropy.  " } }] });
    const generator = new OpenAIAnswerGenerator({ apiKey: "test-key" });

    const answer = await generator.generate("prompt text");

    expect(answer).toBe("  Entropy.  ");
    expect(completionsCreate).toHaveBeenCalledWith({
      model: "gpt-3.5-turbo",
      temperature: 0,
      messages: [{ role: "user", content: "prompt text" }],
    });
  });

  it("fails when OpenAI returns no content", async () => {
    completionsCreate.mockResolvedValue({ choices: [] });
    const generator = new OpenAIAnswerGenerator({ apiKey: "test-key" });

    await expect(generator.generate("p")).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("joins Cohere text content items", async () => {
    cohereChat.mockResolvedValue({
      message: {
        role: "assistant",
        content: [
          { type: "text", text: "Heat " },
          { type: "text", text: "flows." },
        ],
      },
    });
    const generator = new CohereAnswerGenerator({ apiKey: "test-key", model: "command-test" });

    expect(await generator.generate("p")).toBe("Heat flows.");
    expect(cohereChat).toHaveBeenCalledWith({
      model: "command-test",
      temperature: 0,
      messages: [{ role: "user", content: "p" }],
    });
  });
});
