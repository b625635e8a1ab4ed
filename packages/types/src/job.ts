import type { DocumentMetadata } from "./document.js";

export type JobType = "ingest" | "delete";

export interface JobData {
  type: JobType;
  documentId: string;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  text: string;
  metadata: DocumentMetadata;
}

export interface DeleteJobData extends JobData {
  type: "delete";
}

export type AnyJobData = IngestJobData | DeleteJobData;
