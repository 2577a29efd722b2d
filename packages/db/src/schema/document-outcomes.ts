import { pgTable, text, timestamp, integer, pgEnum, index } from "drizzle-orm/pg-core";
import { indexingRuns } from "./indexing-runs.js";

export const outcomeStatusEnum = pgEnum("outcome_status", ["completed", "failed", "skipped"]);

export const documentOutcomes = pgTable(
  "document_outcomes",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    runId: text("run_id")
      .notNull()
      .references(() => indexingRuns.id, { onDelete: "cascade" }),
    documentKey: text("document_key").notNull(),
    status: outcomeStatusEnum("status").notNull(),
    state: text("state").notNull(),
    attempts: integer("attempts").notNull().default(1),
    chunkCount: integer("chunk_count").notNull().default(0),
    vectorCount: integer("vector_count").notNull().default(0),
    processedKey: text("processed_key"),
    errorClass: text("error_class"),
    errorMessage: text("error_message"),
    failedStage: text("failed_stage"),
    skipReason: text("skip_reason"),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    runIdx: index("document_outcomes_run_idx").on(table.runId),
    keyIdx: index("document_outcomes_key_idx").on(table.documentKey),
  }),
);
