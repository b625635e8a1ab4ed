export type { Document, DocumentInput, DocumentMetadata } from "./document.js";
export type { Chunk, ChunkMetadata, ChunkResult, ChunkStrategy, ChunkingConfig } from "./chunk.js";
export type {
  EmbeddingResult,
  IndexEntry,
  RejectedEntry,
  SimilarityMetric,
  StoredChunk,
  UpsertResult,
} from "./pipeline.js";
export type {
  NoContextPolicy,
  QueryOptions,
  RetrievalOptions,
  RetrievalResult,
  ScoredChunk,
} from "./query.js";
export type { AuditRecord, Checkpoint, GuardrailRules, GuardrailVerdict } from "./guardrail.js";
export type { InferenceOptions, InferenceResult, InferenceUsage } from "./inference.js";
export type {
  AnalysisMode,
  FindingPriority,
  PolicyClassification,
  PolicyFinding,
  PolicyStatus,
} from "./analysis.js";
export type {
  AnalysisOutcome,
  DeleteOutcome,
  HealthReport,
  IngestOutcome,
  OutcomeStatus,
  PolicyReportRow,
  QueryOutcome,
  RequestState,
} from "./outcome.js";
export type {
  AppConfig,
  EmbeddingConfig,
  EmbeddingProviderType,
  GuardrailConfig,
  InferenceConfig,
  OllamaConfig,
  RedisConfig,
  RetrievalConfig,
  VectorIndexConfig,
  VectorIndexType,
} from "./config.js";
export type { AnyJobData, DeleteJobData, IngestJobData, JobData, JobType } from "./job.js";
