/**
 * Maps text to fixed-width vectors.
 *
 * Ingestion and search must share one instance (or two configured the same
 * way) so stored and query vectors are comparable. Implementations return
 * one vector per input text, in input order, and the same text always maps
 * to the same vector within a process.
 */
export interface Embedder {
  /**
   * Embeds a batch in a single call. Batch calls are all-or-nothing: a failure
   * rejects with an EmbeddingError and yields no vectors.
   */
  getEmbeddings(texts: string[]): Promise<number[][]>;

  getEmbedding(text: string): Promise<number[]>;

  /**
   * Width of the vectors this embedder produces, when known up front
   */
  readonly dimension?: number;
}
