import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeleteJobData, IngestJobData } from "@docguard/types";

export const QUEUE_NAMES = {
  INGEST: "docguard:ingest",
  DELETE: "docguard:delete",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, defaultOpts);

  const deleteQueue = new Queue<DeleteJobData>(QUEUE_NAMES.DELETE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      priority: 1, // deletes jump ahead of pending ingests
    },
  });

  return { ingestQueue, deleteQueue };
}

export type Queues = ReturnType<typeof createQueues>;
