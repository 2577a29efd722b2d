import type {
  ChunkSource,
  DocumentDescriptor,
  DocumentOutcome,
  EmbeddedChunk,
  ParseResult,
  PipelineStage,
  VectorRecord,
} from "@docindex/types";
import { CancelledError, SourceChangedError, withRetry, type RetryOptions } from "@docindex/errors";
import type { Logger } from "@docindex/logger";
import type { IObjectStore } from "@docindex/storage";
import { extractText } from "@docindex/parser";
import type { ChunkWindow, IChunker } from "@docindex/chunker";
import type { EmbeddingGenerator } from "@docindex/embeddings";
import type { VectorWriter } from "@docindex/vector-store";
import { DocumentStateMachine, type StateChangeListener } from "./document-state-machine.js";
import { classifyStageError } from "./stage-errors.js";
import type { StateTransitioner } from "./state-transitioner.js";

export type ExtractFn = (bytes: Uint8Array, mediaType: string) => Promise<ParseResult>;

export interface DocumentPipelineDependencies {
  store: IObjectStore;
  chunker: IChunker;
  window: ChunkWindow;
  embedder: EmbeddingGenerator;
  writer: VectorWriter;
  transitioner: StateTransitioner;
  logger: Logger;
  /** Retry policy for object storage reads. */
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">;
  extract?: ExtractFn;
  onStateChange?: StateChangeListener;
  now?: () => Date;
}

export interface ProcessContext {
  runId: string;
  /** Checked between stages; a stage already running is allowed to finish. */
  signal?: AbortSignal;
  logger?: Logger;
}

interface Progress {
  attempts: number;
  chunkCount: number;
  vectorCount: number;
  processedKey?: string;
}

/**
 * Extract -> Chunk -> Embed -> Write -> Transition for a single document.
 * Never throws: every outcome, failures included, is returned.
 */
export class DocumentPipeline {
  private readonly extract: ExtractFn;
  private readonly now: () => Date;

  constructor(private readonly deps: DocumentPipelineDependencies) {
    this.extract = deps.extract ?? ((bytes, mediaType) => extractText(bytes, mediaType));
    this.now = deps.now ?? (() => new Date());
  }

  async process(doc: DocumentDescriptor, context: ProcessContext): Promise<DocumentOutcome> {
    const startedAt = this.now();
    const logger = (context.logger ?? this.deps.logger).child({ documentKey: doc.key });
    const machine = new DocumentStateMachine(doc.key, this.deps.onStateChange);
    const progress: Progress = { attempts: 1, chunkCount: 0, vectorCount: 0 };
    const callContext = {
      noteAttempts: (attempts: number) => {
        progress.attempts = Math.max(progress.attempts, attempts);
      },
    };
    const source: ChunkSource = { documentKey: doc.key, fingerprint: doc.fingerprint };

    const finish = (
      status: DocumentOutcome["status"],
      extra: Partial<DocumentOutcome> = {},
    ): DocumentOutcome => ({
      key: doc.key,
      status,
      state: machine.state,
      attempts: progress.attempts,
      chunkCount: progress.chunkCount,
      vectorCount: progress.vectorCount,
      processedKey: progress.processedKey,
      startedAt,
      finishedAt: this.now(),
      ...extra,
    });

    const cursor: { stage: PipelineStage } = { stage: "extracting" };
    const enter = (next: PipelineStage): void => {
      if (context.signal?.aborted) {
        throw new CancelledError();
      }
      cursor.stage = next;
      machine.transition(next);
    };

    try {
      enter("extracting");
      const parsed = await this.read(doc);
      logger.debug({ pageCount: parsed.pageCount, chars: parsed.text.length }, "text extracted");

      enter("chunking");
      const chunks = this.deps.chunker.chunk(parsed.text, this.deps.window, source);
      progress.chunkCount = chunks.length;

      enter("embedding");
      const embedded = chunks.length > 0 ? await this.deps.embedder.embed(chunks, callContext) : [];

      enter("writing");
      const records = embedded.map((chunk) => this.toRecord(chunk, chunks.length, doc, parsed));
      progress.vectorCount = await this.deps.writer.write(records, source, callContext);

      enter("transitioning");
      progress.processedKey = await this.deps.transitioner.markProcessed(
        doc,
        { runId: context.runId, chunkCount: progress.chunkCount, vectorCount: progress.vectorCount },
      );

      machine.transition("completed");
      logger.info(
        { chunks: progress.chunkCount, vectors: progress.vectorCount, attempts: progress.attempts },
        "document indexed",
      );
      return finish("completed");
    } catch (error: unknown) {
      const { stage } = cursor;
      const failure = classifyStageError(error, stage);
      if (failure.kind === "cancelled") {
        logger.info({ state: machine.state }, "document cancelled");
        return finish("skipped", { skipReason: "cancelled" });
      }
      machine.fail();
      logger.warn(
        { stage, errorClass: failure.errorClass, err: failure.error, attempts: progress.attempts },
        "document failed",
      );
      return finish("failed", {
        errorClass: failure.errorClass,
        errorMessage: failure.message,
        failedStage: stage,
      });
    }
  }

  private async read(doc: DocumentDescriptor): Promise<ParseResult> {
    const object = await withRetry(() => this.deps.store.get(doc.key), this.deps.retry);
    if (object.fingerprint !== undefined && object.fingerprint !== doc.fingerprint) {
      throw new SourceChangedError(doc.key, {
        details: { listed: doc.fingerprint, read: object.fingerprint },
      });
    }
    return this.extract(object.body, doc.mediaType);
  }

  private toRecord(
    chunk: EmbeddedChunk,
    totalChunks: number,
    doc: DocumentDescriptor,
    parsed: ParseResult,
  ): VectorRecord {
    return {
      id: chunk.id,
      vector: chunk.vector,
      payload: {
        documentKey: doc.key,
        relativeKey: doc.relativeKey,
        fingerprint: doc.fingerprint,
        text: chunk.text,
        chunkIndex: chunk.index,
        startChar: chunk.startChar,
        endChar: chunk.endChar,
        totalChunks,
        embeddingModel: this.deps.embedder.model,
        mediaType: doc.mediaType,
        pageCount: parsed.pageCount,
        sourceSize: doc.size,
        sourceLastModified: doc.lastModified.toISOString(),
      },
    };
  }
}
