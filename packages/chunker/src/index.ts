export { chunkTokens, DEFAULT_TOKEN_WINDOW } from "./token-window-chunker.js";
export { chunkSentences, DEFAULT_SENTENCE_BUDGET } from "./sentence-boundary-chunker.js";
