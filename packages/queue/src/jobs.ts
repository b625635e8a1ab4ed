import { z } from "zod";
import type { DeleteJobData, IngestJobData } from "@docguard/types";
import { ValidationError } from "@docguard/errors";

const documentId = z.string().trim().min(1, "documentId is required");

export const ingestJobSchema = z.object({
  type: z.literal("ingest"),
  documentId,
  text: z.string(),
  metadata: z
    .object({
      filename: z.string().optional(),
      contentType: z.string().optional(),
      uploadedAt: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

export const deleteJobSchema = z.object({
  type: z.literal("delete"),
  documentId,
});

function invalidJob(kind: string, error: z.ZodError): ValidationError {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    fields[issue.path.join(".") || "job"] = issue.message;
  }
  const summary = Object.entries(fields)
    .map(([key, message]) => `${key}: ${message}`)
    .join("; ");
  return new ValidationError(`Invalid ${kind} job: ${summary}`, fields, { cause: error });
}

/** Throws a ValidationError naming each bad field. */
export function parseIngestJob(data: unknown): IngestJobData {
  const result = ingestJobSchema.safeParse(data);
  if (!result.success) throw invalidJob("ingest", result.error);
  return result.data;
}

export function parseDeleteJob(data: unknown): DeleteJobData {
  const result = deleteJobSchema.safeParse(data);
  if (!result.success) throw invalidJob("delete", result.error);
  return result.data;
}
