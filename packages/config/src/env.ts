import { z } from "zod";
import type { BoundaryLevel, PipelineConfig } from "@docindex/types";

const BOUNDARY_LEVELS = ["section", "paragraph", "sentence", "line", "word"] as const;

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const optionalPositiveInt = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val === "" ? undefined : Number(val)))
  .pipe(z.number().int().positive().optional());

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const prefix = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((val) => val.length > 0 && val.endsWith("/"), {
      message: "prefix must be non-empty and end with /",
    });

/**
 * Zod schema for the pipeline's environment variables.
 * Validates, transforms, and provides defaults so that the resulting
 * object maps onto a strongly-typed PipelineConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

    // ---------- Object storage ----------
    S3_BUCKET: z.string().min(1).default("enterprise-data"),
    S3_REGION: z.string().min(1).default("us-east-1"),
    S3_ENDPOINT_URL: z.string().url().optional(),
    S3_FORCE_PATH_STYLE: z
      .enum(["true", "false"])
      .default("false")
      .transform((val) => val === "true"),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    SOURCE_PREFIX: prefix("source/"),
    PROCESSED_PREFIX: prefix("processed/"),
    SOURCE_EXTENSIONS: csv(".pdf,.txt,.md")
      .transform((exts) => exts.map((ext) => ext.toLowerCase()))
      .refine((exts) => exts.length > 0 && exts.every((ext) => ext.startsWith(".")), {
        message: "SOURCE_EXTENSIONS must list extensions such as .pdf",
      }),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["boundary", "fixed"]).default("boundary"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
    CHUNK_BOUNDARIES: csv("section,paragraph,sentence").pipe(
      z.array(z.enum(BOUNDARY_LEVELS)).min(1),
    ),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    EMBEDDING_BATCH_SIZE: positiveInt("20"),
    EMBEDDING_REQUESTS_PER_SECOND: positiveInt("5"),
    EMBEDDING_BURST: positiveInt("5"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().min(1).default("http://localhost:6333"),
    QDRANT_API_KEY: z.string().optional(),
    COLLECTION_NAME: z.string().min(1).default("enterprise-knowledge-base"),
    VECTOR_BATCH_SIZE: positiveInt("50"),
    VECTOR_REQUESTS_PER_SECOND: positiveInt("20"),
    VECTOR_BURST: positiveInt("20"),

    // ---------- Run ----------
    MAX_CONCURRENCY: positiveInt("5"),
    MAX_RETRY_ATTEMPTS: positiveInt("3"),
    BACKOFF_BASE_MS: positiveInt("1000"),
    BACKOFF_CAP_MS: positiveInt("30000"),
    CALL_TIMEOUT_MS: positiveInt("30000"),
    RUN_DEADLINE_MS: optionalPositiveInt,
    PROCESSED_RETENTION_DAYS: optionalPositiveInt,
    RUN_SCHEDULE: z.string().min(1).optional(),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

    // ---------- Notifications ----------
    NOTIFY_WEBHOOK_URL: z.string().url().optional(),
    DATABASE_URL: z
      .string()
      .refine((url) => url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgresql://",
      })
      .optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SOURCE_PREFIX === env.PROCESSED_PREFIX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PROCESSED_PREFIX"],
        message: "PROCESSED_PREFIX must differ from SOURCE_PREFIX",
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be less than CHUNK_SIZE",
      });
    }
    if (env.BACKOFF_BASE_MS > env.BACKOFF_CAP_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BACKOFF_BASE_MS"],
        message: "BACKOFF_BASE_MS must not exceed BACKOFF_CAP_MS",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link PipelineConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsed = envSchema.parse(env);
  const boundaries: BoundaryLevel[] = parsed.CHUNK_BOUNDARIES;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    storage: {
      bucket: parsed.S3_BUCKET,
      region: parsed.S3_REGION,
      endpoint: parsed.S3_ENDPOINT_URL,
      forcePathStyle: parsed.S3_FORCE_PATH_STYLE,
      accessKeyId: parsed.AWS_ACCESS_KEY_ID,
      secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
      sourcePrefix: parsed.SOURCE_PREFIX,
      processedPrefix: parsed.PROCESSED_PREFIX,
      extensions: parsed.SOURCE_EXTENSIONS,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      boundaries,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      requestsPerSecond: parsed.EMBEDDING_REQUESTS_PER_SECOND,
      burst: parsed.EMBEDDING_BURST,
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        model: parsed.COHERE_EMBED_MODEL,
      },
      bgeM3: {
        baseUrl: parsed.BGE_M3_URL ?? "",
      },
    },

    vectorStore: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collectionName: parsed.COLLECTION_NAME,
      batchSize: parsed.VECTOR_BATCH_SIZE,
      requestsPerSecond: parsed.VECTOR_REQUESTS_PER_SECOND,
      burst: parsed.VECTOR_BURST,
    },

    run: {
      maxConcurrency: parsed.MAX_CONCURRENCY,
      deadlineMs: parsed.RUN_DEADLINE_MS,
      processedRetentionDays: parsed.PROCESSED_RETENTION_DAYS,
      schedule: parsed.RUN_SCHEDULE,
    },

    retry: {
      maxAttempts: parsed.MAX_RETRY_ATTEMPTS,
      backoffBaseMs: parsed.BACKOFF_BASE_MS,
      backoffCapMs: parsed.BACKOFF_CAP_MS,
      callTimeoutMs: parsed.CALL_TIMEOUT_MS,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    notifications: {
      webhookUrl: parsed.NOTIFY_WEBHOOK_URL,
      databaseUrl: parsed.DATABASE_URL,
    },
  };
}
