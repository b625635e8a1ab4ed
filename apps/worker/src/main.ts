import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import type { AnyJobData, DeleteJobData, IngestJobData } from "@docguard/types";
import { loadGuardrailRules, parseEnv } from "@docguard/config";
import { createOrchestrator } from "@docguard/core";
import type { RagOrchestrator } from "@docguard/core";
import { createChildLogger, createLogger } from "@docguard/logger";
import type { Logger } from "@docguard/logger";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  isFinalFailure,
  moveToDeadLetter,
  parseRedisConnection,
} from "@docguard/queue";
import type { DeadLetterQueue } from "@docguard/queue";
import { processIngest } from "./processors/ingest.js";
import { processDelete } from "./processors/delete.js";

interface WorkerContext {
  connection: ConnectionOptions;
  orchestrator: RagOrchestrator;
  deadLetters: DeadLetterQueue;
  logger: Logger;
}

function forwardFailures<T extends AnyJobData>(worker: Worker<T>, ctx: WorkerContext): void {
  worker.on("failed", (job: Job<T> | undefined, error: Error) => {
    if (!job) return;
    const log = createChildLogger(ctx.logger, { queue: worker.name, jobId: job.id, documentId: job.data.documentId });

    if (!isFinalFailure(job, error)) {
      log.warn({ err: error, attemptsMade: job.attemptsMade }, "Job failed, will retry");
      return;
    }

    log.error({ err: error }, "Job failed permanently, moving to dead-letter queue");
    moveToDeadLetter(ctx.deadLetters, worker.name, job.data, error).catch((dlqError: unknown) => {
      log.error({ err: dlqError }, "Could not move job to dead-letter queue");
    });
  });
}

function createWorkers(ctx: WorkerContext): Worker[] {
  const { connection, orchestrator } = ctx;

  const ingestWorker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      await processIngest(job.data, { orchestrator, logger: createChildLogger(ctx.logger, { jobId: job.id }) });
    },
    { connection, concurrency: 5 },
  );

  const deleteWorker = new Worker<DeleteJobData>(
    QUEUE_NAMES.DELETE,
    async (job) => {
      await processDelete(job.data, { orchestrator, logger: createChildLogger(ctx.logger, { jobId: job.id }) });
    },
    { connection, concurrency: 3 },
  );

  forwardFailures(ingestWorker, ctx);
  forwardFailures(deleteWorker, ctx);

  return [ingestWorker, deleteWorker];
}

async function main(): Promise<void> {
  const config = parseEnv(process.env);
  const logger = createLogger({ level: config.logLevel, service: "docguard-worker" });

  const rules = await loadGuardrailRules(config.guardrails.rulesPath);
  const orchestrator = await createOrchestrator(config, { logger, rules });

  const connection = parseRedisConnection(config.redis.url);
  const deadLetters = createDeadLetterQueue(connection);
  const workers = createWorkers({ connection, orchestrator, deadLetters, logger });

  logger.info({ workers: workers.length, queues: Object.values(QUEUE_NAMES) }, "Workers started");

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await deadLetters.close();
    orchestrator.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err: unknown) => {
  createLogger({ service: "docguard-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
