import type { IVectorStore } from "./vector-store.interface.js";

/** Used when no vector index is configured. Local chunk rows remain the source of truth. */
export class NoopVectorStore implements IVectorStore {
  readonly name = "noop";

  async deleteVectors(_vectorIds: readonly string[]): Promise<void> {}
}
