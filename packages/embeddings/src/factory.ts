import type { EmbeddingProviderType } from "@docindex/types";
import type { Logger } from "@docindex/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import type { BgeM3ProviderConfig } from "./bge-m3-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  dimensions?: number;
  timeoutMs?: number;
  logger?: Logger;
  cohere?: Pick<CohereProviderConfig, "apiKey" | "model">;
  bgeM3?: Pick<BgeM3ProviderConfig, "baseUrl" | "maxBatchSize">;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const shared = { dimensions: config.dimensions, timeoutMs: config.timeoutMs, logger: config.logger };
  switch (config.provider) {
    case "cohere":
      if (!config.cohere?.apiKey) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({ ...config.cohere, ...shared });
    case "bge-m3":
      if (!config.bgeM3?.baseUrl) {
        throw new Error("BGE-M3 config is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider({ ...config.bgeM3, ...shared });
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
