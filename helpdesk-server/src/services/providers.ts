import type { ContextPassage, EmbeddingVector } from "../types/records";

export interface EmbeddingProvider {
  /** One vector per input text, same order, same dimensionality. */
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export type AnswerOptions = {
  signal?: AbortSignal;
  onToken?: (token: string) => void | Promise<void>;
  noContext?: boolean;
};

export interface ChatProvider {
  answer(
    question: string,
    context: readonly ContextPassage[],
    options?: AnswerOptions
  ): Promise<string>;
}

export const SYSTEM_PROMPT = [
  "You are a helpdesk assistant answering from a local knowledge base.",
  "Answer using only the provided context.",
  "Cite sources by their bracketed number, for example [1] or [2].",
  "If the answer is not present in the context, say that you do not know.",
].join(" ");

export const formatContext = (context: readonly ContextPassage[]) =>
  context
    .map(
      (passage, index) =>
        `[${index + 1}] ${passage.citation.title}\nOrigin: ${
          passage.citation.origin
        }\nSnippet: ${passage.text}`
    )
    .join("\n\n");

export const buildUserPrompt = (
  question: string,
  context: readonly ContextPassage[]
) => {
  const contextSection = context.length
    ? formatContext(context)
    : "No supporting context was found in the knowledge base.";
  return `Question:\n${question}\n\nContext:\n${contextSection}`;
};
