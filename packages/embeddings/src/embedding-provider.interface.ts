import type { EmbeddingResult } from "@docindex/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  /** Most texts a single request may carry. */
  readonly maxBatchSize: number;

  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
}
