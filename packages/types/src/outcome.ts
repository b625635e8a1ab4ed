import type { PolicyClassification } from "./analysis.js";
import type { AuditRecord, GuardrailVerdict } from "./guardrail.js";
import type { ScoredChunk } from "./query.js";

export type OutcomeStatus = "success" | "blocked" | "degraded" | "failed";

export type RequestState =
  | "Received"
  | "PreGuard"
  | "Retrieving"
  | "PromptBuilt"
  | "Inferring"
  | "PostGuard"
  | "Responded"
  | "FallbackResponded";

export interface QueryOutcome {
  status: OutcomeStatus;
  answer: string;
  sourceChunks: ScoredChunk[];
  verdict: GuardrailVerdict;
  audit: AuditRecord;
  trace: RequestState[];
}

export interface AnalysisOutcome {
  status: OutcomeStatus;
  result: string;
  verdict: GuardrailVerdict;
  classification?: PolicyClassification;
  trace: RequestState[];
}

/** One document's line in a corpus-wide policy report. */
export interface PolicyReportRow {
  documentId: string;
  filename: string;
  status: OutcomeStatus;
  classification?: PolicyClassification;
}

export interface IngestOutcome {
  status: "success" | "failed";
  documentId: string;
  chunkCount: number;
  rejected: number;
  tokensUsed: number;
  error?: { code: string; message: string };
}

export interface HealthReport {
  indexReachable: boolean;
  embedderReachable: boolean;
  inferenceReachable: boolean;
}

export interface DeleteOutcome {
  documentId: string;
  removedChunks: number;
}
