export {
  QUEUE_NAMES,
  createIndexRunQueue,
  syncRunSchedule,
  type IndexRunQueue,
  type QueueConfig,
} from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, type DeadLetterQueue } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
