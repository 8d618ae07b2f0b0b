import { ValidationError } from "@docboard/errors";
import type { ChunkOptions } from "@docboard/types";

export const DEFAULT_TOKEN_WINDOW: ChunkOptions = { chunkSize: 512, overlap: 50 };

/**
 * Splits on whitespace and emits windows of `chunkSize` tokens, each starting
 * `chunkSize - overlap` tokens after the previous one.
 */
export function chunkTokens(text: string, options: Partial<ChunkOptions> = {}): string[] {
  const { chunkSize, overlap } = { ...DEFAULT_TOKEN_WINDOW, ...options };

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError("chunkSize must be a positive integer", { chunkSize: String(chunkSize) });
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError("overlap must be a non-negative integer", { overlap: String(overlap) });
  }
  if (chunkSize <= overlap) {
    throw new ValidationError("chunkSize must be greater than overlap", {
      chunkSize: String(chunkSize),
      overlap: String(overlap),
    });
  }

  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  const step = chunkSize - overlap;
  const chunks: string[] = [];

  for (let start = 0; start < tokens.length; start += step) {
    chunks.push(tokens.slice(start, start + chunkSize).join(" "));
  }

  return chunks;
}
