import { GroundingContext } from "./types.js";

export const SYSTEM_PROMPT = [
  "You compile web search results into an answer for another agent.",
  "Answer only from the provided context and be complete and specific.",
  "Give step-by-step instructions when the question asks how to do something.",
  "If the context does not cover the question, say that you do not have enough information.",
  "Cite evidence inline as [1], [2] using the context numbers.",
  "End with the URLs you relied on, one per line, formatted as `* <url>`.",
].join(" ");

export function buildContextBlock(contexts: GroundingContext[]): string {
  return contexts
    .map(
      (context, idx) =>
        `[${idx + 1}] source=${context.source}\ntitle=${context.title}\n${context.snippet}`,
    )
    .join("\n\n");
}

export function buildUserPrompt(question: string, contexts: GroundingContext[]): string {
  return `Question:\n${question}\n\nContext:\n${buildContextBlock(contexts)}`;
}
