/**
 * Remote vector index as seen by the chunk lifecycle. Chunks are written with
 * placeholder embeddings, so only removal reaches the index.
 */
export interface IVectorStore {
  readonly name: string;
  deleteVectors(vectorIds: readonly string[]): Promise<void>;
}
