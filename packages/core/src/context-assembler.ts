import type { ScoredChunk } from "@docguard/types";
import { estimateTokens } from "@docguard/chunker";

export const DEFAULT_ORGANIZATIONAL_VALUES = "respect, integrity, and service";

/**
 * Numbered plain-text sections, one per chunk, in the order given.
 */
export function assembleContext(chunks: ScoredChunk[]): string {
  if (chunks.length === 0) return "";

  const parts = chunks.map(
    (chunk, i) => `[${String(i + 1)}] (Source: ${chunk.documentId})\n${chunk.content}`,
  );

  return parts.join("\n\n");
}

export function buildAnswerPrompt(
  question: string,
  chunks: ScoredChunk[],
  organizationalValues: string = DEFAULT_ORGANIZATIONAL_VALUES,
): string {
  const context = assembleContext(chunks) || "(no relevant passages were found)";

  return [
    `You are an assistant for our organization. Answers must reflect our values of ${organizationalValues}.`,
    "Be professional and keep personal information confidential.",
    "Answer using only the context below. If the context does not contain the answer, say so.",
    "",
    "Context:",
    context,
    "",
    `Question: ${question}`,
    "",
    "Answer:",
  ].join("\n");
}

export interface BudgetedPrompt {
  prompt: string;
  /** Chunks that made it into the prompt, best first. */
  used: ScoredChunk[];
  /** Chunks left out to fit the budget, lowest score first. */
  dropped: ScoredChunk[];
}

/**
 * Drops retrieved chunks lowest-score-first until the prompt's estimated
 * token count fits `budgetTokens`. The question is never shortened, so a
 * question alone may still exceed the budget.
 */
export function fitPromptToBudget(
  question: string,
  chunks: ScoredChunk[],
  budgetTokens: number,
  organizationalValues?: string,
): BudgetedPrompt {
  const used = [...chunks].sort((a, b) => b.score - a.score);
  const dropped: ScoredChunk[] = [];
  let prompt = buildAnswerPrompt(question, used, organizationalValues);

  while (used.length > 0 && estimateTokens(prompt) > budgetTokens) {
    const lowest = used.pop();
    if (lowest) dropped.push(lowest);
    prompt = buildAnswerPrompt(question, used, organizationalValues);
  }

  return { prompt, used, dropped };
}
