import { ValidationError } from "@docboard/errors";
import type { ChunkOptions } from "@docboard/types";

export const DEFAULT_SENTENCE_BUDGET = 1000;

const TERMINATORS = [".", "!", "?", "\n"] as const;

function isTerminator(char: string | undefined): boolean {
  return char !== undefined && (TERMINATORS as readonly string[]).includes(char);
}

function lastTerminator(window: string): number {
  return Math.max(...TERMINATORS.map((t) => window.lastIndexOf(t)));
}

/**
 * Cuts text into pieces of at most `budget` characters. A cut that would split
 * a sentence backs up to the last terminator in the window, provided that
 * terminator sits past the window's midpoint.
 */
export function chunkSentences(text: string, budget = DEFAULT_SENTENCE_BUDGET): string[] {
  if (!Number.isInteger(budget) || budget < 1) {
    throw new ValidationError("budget must be a positive integer", { budget: String(budget) });
  }

  const chunks: string[] = [];
  let pos = 0;

  while (pos < text.length) {
    let end = Math.min(pos + budget, text.length);

    if (end < text.length && !isTerminator(text[end - 1])) {
      const cut = lastTerminator(text.slice(pos, end));
      if (cut > Math.floor(budget / 2)) end = pos + cut + 1;
    }

    const piece = text.slice(pos, end).trim();
    if (piece.length > 0) chunks.push(piece);
    pos = end;
  }

  return chunks;
}
