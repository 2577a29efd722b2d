import { pgTable, text, timestamp, integer, pgEnum } from "drizzle-orm/pg-core";

export const runStatusEnum = pgEnum("run_status", ["completed", "cancelled"]);

export const indexingRuns = pgTable("indexing_runs", {
  id: text("id").primaryKey(),
  status: runStatusEnum("status").notNull(),
  totalDocuments: integer("total_documents").notNull().default(0),
  completedDocuments: integer("completed_documents").notNull().default(0),
  failedDocuments: integer("failed_documents").notNull().default(0),
  skippedDocuments: integer("skipped_documents").notNull().default(0),
  chunkCount: integer("chunk_count").notNull().default(0),
  vectorCount: integer("vector_count").notNull().default(0),
  startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
