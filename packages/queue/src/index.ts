export { QUEUE_NAMES, createQueues } from "./queues.js";
export type { QueueConfig, QueueName, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, isFinalFailure, moveToDeadLetter } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue, DeadLetterSink, FailedJobView } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
export { ingestJobSchema, deleteJobSchema, parseIngestJob, parseDeleteJob } from "./jobs.js";
