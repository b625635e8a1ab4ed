import { Queue, UnrecoverableError } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@docguard/types";

export const DLQ_NAME = "docguard:dead-letter";

export type DeadLetterJobData = AnyJobData & { originalQueue: string; failureReason: string };

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

/** The part of a queue the dead-letter hand-off writes to. */
export interface DeadLetterSink {
  add(name: string, data: DeadLetterJobData): Promise<unknown>;
}

export interface FailedJobView {
  attemptsMade: number;
  opts: { attempts?: number };
}

/** True once bullmq will not run the job again. */
export function isFinalFailure(job: FailedJobView, error: Error): boolean {
  return error instanceof UnrecoverableError || job.attemptsMade >= (job.opts.attempts ?? 1);
}

export async function moveToDeadLetter(
  sink: DeadLetterSink,
  originalQueue: string,
  data: AnyJobData,
  error: Error,
): Promise<void> {
  await sink.add(`${data.type}:${data.documentId}`, {
    ...data,
    originalQueue,
    failureReason: error.message,
  });
}
