export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionResult } from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { DEFAULT_EMBEDDING_RETRY, embedWithRetry } from "./embedding-retry.js";
export type { EmbeddingRetryPolicy } from "./embedding-retry.js";

export {
  assembleContext,
  buildAnswerPrompt,
  fitPromptToBudget,
  DEFAULT_ORGANIZATIONAL_VALUES,
} from "./context-assembler.js";
export type { BudgetedPrompt } from "./context-assembler.js";

export { InMemoryDocumentStore, contentHash } from "./document-store.js";
export type { IDocumentStore } from "./document-store.js";

export { KeyedMutex } from "./keyed-mutex.js";

export {
  ANALYSIS_MAX_CHARS,
  buildClassificationPrompt,
  buildSummaryPrompt,
  classifyPolicy,
  extractPolicyFields,
  parsePolicyDate,
} from "./policy-analysis.js";
export type { ClassificationContext, PolicyFields } from "./policy-analysis.js";

export { RagOrchestrator } from "./orchestrator.js";
export type { OrchestratorDependencies, OrchestratorSettings, PolicyReportOptions } from "./orchestrator.js";

export { createOrchestrator } from "./bootstrap.js";
export type { BootstrapOptions } from "./bootstrap.js";
