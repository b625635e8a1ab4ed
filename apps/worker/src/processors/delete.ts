import { UnrecoverableError } from "bullmq";
import type { DeleteJobData, DeleteOutcome } from "@docguard/types";
import type { RagOrchestrator } from "@docguard/core";
import type { Logger } from "@docguard/logger";
import { NotFoundError } from "@docguard/errors";
import { parseDeleteJob } from "@docguard/queue";

export interface DeleteProcessorDeps {
  orchestrator: Pick<RagOrchestrator, "deleteDocument">;
  logger: Logger;
}

function toJob(data: unknown): DeleteJobData {
  try {
    return parseDeleteJob(data);
  } catch (error: unknown) {
    throw new UnrecoverableError(error instanceof Error ? error.message : `Invalid delete job: ${String(error)}`);
  }
}

/**
 * Cascading delete processor: index entries first, then the stored text.
 * Deleting a document that is already gone completes the job.
 */
export async function processDelete(data: unknown, deps: DeleteProcessorDeps): Promise<DeleteOutcome> {
  const { documentId } = toJob(data);

  try {
    const outcome = await deps.orchestrator.deleteDocument(documentId);
    deps.logger.info({ documentId, removedChunks: outcome.removedChunks }, "Delete job completed");
    return outcome;
  } catch (error: unknown) {
    if (error instanceof NotFoundError) {
      deps.logger.info({ documentId }, "Document already deleted");
      return { documentId, removedChunks: 0 };
    }
    throw error;
  }
}
