/**
 * Embedding provider interface.
 * Turns course text and user queries into vectors for pgvector search.
 */

export interface IEmbeddingProvider {
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** Embeddings in the same order as `texts`. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
