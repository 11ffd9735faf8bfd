/**
 * Turns text into a fixed-length vector. One provider instance always
 * returns vectors of the same dimensionality.
 */
export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}
