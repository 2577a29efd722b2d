export * from "./schema/index.js";
export { createDbClient, type DbClient, type DbClientOptions, type DbHandle } from "./client.js";
export {
  RunHistoryRepository,
  toOutcomeRow,
  toRunRow,
  type DocumentOutcomeRow,
  type IndexingRunRow,
  type IRunHistoryStore,
} from "./run-history.js";
