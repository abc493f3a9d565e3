export const UNKNOWN_ANSWER = "I don't know based on the provided context.";

export const PROMPT_TEMPLATE = `You are a helpful assistant.
Answer the question using ONLY the Context below.
If the answer is not in the Context, say "${UNKNOWN_ANSWER}"

Context:
{context}

Question:
{question}
`;

export function buildPrompt(context: string, question: string): string {
  // One pass, so placeholders inside the context or question stay literal.
  return PROMPT_TEMPLATE.replace(/\{(context|question)\}/g, (_match, key: string) =>
    key === "context" ? context : question,
  );
}
