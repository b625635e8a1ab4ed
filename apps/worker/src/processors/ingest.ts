import { UnrecoverableError } from "bullmq";
import type { IngestJobData, IngestOutcome } from "@docguard/types";
import type { RagOrchestrator } from "@docguard/core";
import type { Logger } from "@docguard/logger";
import { parseIngestJob } from "@docguard/queue";

export interface IngestProcessorDeps {
  orchestrator: Pick<RagOrchestrator, "ingest">;
  logger: Logger;
}

/** Failure codes worth another attempt; anything else is a bad job. */
const TRANSIENT_CODES: ReadonlySet<string> = new Set(["BACKEND_UNAVAILABLE", "INGESTION_FAILED"]);

function toJob(data: unknown): IngestJobData {
  try {
    return parseIngestJob(data);
  } catch (error: unknown) {
    throw new UnrecoverableError(error instanceof Error ? error.message : `Invalid ingest job: ${String(error)}`);
  }
}

/**
 * Ingest job processor.
 *
 * Runs the job through the orchestrator and turns a failed outcome into a
 * thrown error so bullmq can retry it; invalid jobs fail without retrying.
 */
export async function processIngest(data: unknown, deps: IngestProcessorDeps): Promise<IngestOutcome> {
  const job = toJob(data);
  const outcome = await deps.orchestrator.ingest(job.documentId, job.text, job.metadata);

  if (outcome.status === "failed") {
    const code = outcome.error?.code ?? "INGESTION_FAILED";
    const message = `[${code}] ${outcome.error?.message ?? "Document could not be ingested"}`;
    if (!TRANSIENT_CODES.has(code)) throw new UnrecoverableError(message);
    throw new Error(message);
  }

  deps.logger.info(
    { documentId: outcome.documentId, chunkCount: outcome.chunkCount, rejected: outcome.rejected },
    "Ingest job completed",
  );
  return outcome;
}
