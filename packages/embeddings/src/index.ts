export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider, mapCohereError } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { EmbeddingGenerator } from "./embedding-generator.js";
export type { EmbeddingGeneratorOptions } from "./embedding-generator.js";
export { errorForStatus, parseRetryAfter } from "./http-errors.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
