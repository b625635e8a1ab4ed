import { randomUUID } from "node:crypto";
import type {
  AnalysisMode,
  AnalysisOutcome,
  ChunkingConfig,
  DeleteOutcome,
  Document,
  DocumentMetadata,
  GuardrailVerdict,
  HealthReport,
  IngestOutcome,
  PolicyClassification,
  PolicyReportRow,
  QueryOptions,
  QueryOutcome,
  RequestState,
  RetrievalConfig,
  ScoredChunk,
} from "@docguard/types";
import type { IChunker } from "@docguard/chunker";
import { reconstructText, validateChunkingConfig } from "@docguard/chunker";
import type { IEmbeddingProvider } from "@docguard/embeddings";
import type { IVectorIndex } from "@docguard/vector-index";
import type { GuardrailEngine } from "@docguard/guardrails";
import type { InferenceClient } from "@docguard/inference";
import type { Logger } from "@docguard/logger";
import { createChildLogger, previewText } from "@docguard/logger";
import { AppError, NotFoundError } from "@docguard/errors";
import { ingest } from "./ingestion-pipeline.js";
import { retrieve } from "./retrieval-pipeline.js";
import { fitPromptToBudget } from "./context-assembler.js";
import type { IDocumentStore } from "./document-store.js";
import { contentHash } from "./document-store.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { EmbeddingRetryPolicy } from "./embedding-retry.js";
import {
  ANALYSIS_MAX_CHARS,
  buildClassificationPrompt,
  buildSummaryPrompt,
  classifyPolicy,
  extractPolicyFields,
} from "./policy-analysis.js";

export interface OrchestratorDependencies {
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  documentStore: IDocumentStore;
  guardrails: GuardrailEngine;
  inference: InferenceClient;
  logger: Logger;
}

export interface OrchestratorSettings {
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  analysisMaxChars?: number;
  embeddingRetry?: EmbeddingRetryPolicy;
  /** Clock used for policy expiry; injectable for tests. */
  now?: () => Date;
}

const ALLOW: GuardrailVerdict = { kind: "allow" };
const EMPTY_QUERY = "empty_query";
const NOT_FOUND = "not_found";
const REPORT_CONCURRENCY = 4;

export interface PolicyReportOptions {
  /** Documents classified at the same time. */
  concurrency?: number;
}

/** Records state transitions for one request and mirrors them to the debug log. */
class RequestTrace {
  readonly states: RequestState[] = [];

  constructor(private readonly logger: Logger) {}

  enter(state: RequestState): void {
    this.states.push(state);
    this.logger.debug({ state }, "Request state");
  }
}

type Generation = { ok: true; text: string } | { ok: false; afterFirstFragment: boolean };

/**
 * Composes ingestion (chunk, embed, index) and guarded question answering
 * (pre-guard, retrieve, budget, infer, post-guard). Every outcome is one of
 * success, blocked, degraded or failed; backend errors never reach callers.
 */
export class RagOrchestrator {
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;
  private readonly analysisMaxChars: number;
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly settings: OrchestratorSettings,
  ) {
    validateChunkingConfig(settings.chunking);
    this.logger = deps.logger;
    this.analysisMaxChars = settings.analysisMaxChars ?? ANALYSIS_MAX_CHARS;
    this.now = settings.now ?? (() => new Date());
  }

  async ingest(documentId: string, text: string, metadata: DocumentMetadata = {}): Promise<IngestOutcome> {
    const log = createChildLogger(this.logger, { documentId });

    return this.locks.runExclusive(documentId, async () => {
      try {
        const result = await ingest(
          { documentId, text, metadata },
          {
            chunker: this.deps.chunker,
            chunking: this.settings.chunking,
            embeddingProvider: this.deps.embeddingProvider,
            vectorIndex: this.deps.vectorIndex,
            documentStore: this.deps.documentStore,
            logger: log,
            embeddingRetry: this.settings.embeddingRetry,
          },
        );
        return {
          status: "success",
          documentId,
          chunkCount: result.chunkCount,
          rejected: result.rejected.length,
          tokensUsed: result.tokensUsed,
        };
      } catch (error: unknown) {
        log.error({ err: error }, "Ingestion failed");
        return {
          status: "failed",
          documentId,
          chunkCount: 0,
          rejected: 0,
          tokensUsed: 0,
          error: AppError.isAppError(error)
            ? { code: error.code, message: error.message }
            : { code: "INGESTION_FAILED", message: "Document could not be ingested" },
        };
      }
    });
  }

  async answerQuery(text: string, options: QueryOptions = {}): Promise<QueryOutcome> {
    const log = createChildLogger(this.logger, { requestId: randomUUID() });
    const trace = new RequestTrace(log);
    const { guardrails } = this.deps;
    const { retrieval } = this.settings;

    trace.enter("Received");
    log.info({ query: previewText(text) }, "Query received");
    const audit = guardrails.audit(text);

    trace.enter("PreGuard");
    const pre: GuardrailVerdict =
      text.trim().length === 0
        ? { kind: "block", reason: EMPTY_QUERY, message: guardrails.message(EMPTY_QUERY) }
        : guardrails.inspect("query", text);
    if (pre.kind !== "allow") {
      trace.enter("Responded");
      return {
        status: "blocked",
        answer: pre.message,
        sourceChunks: [],
        verdict: pre,
        audit,
        trace: trace.states,
      };
    }

    trace.enter("Retrieving");
    let retrieved: ScoredChunk[] = [];
    try {
      retrieved = await retrieve(
        text,
        { topK: options.topK ?? retrieval.topK, minScore: retrieval.minScore },
        {
          embeddingProvider: this.deps.embeddingProvider,
          vectorIndex: this.deps.vectorIndex,
          embeddingRetry: this.settings.embeddingRetry,
          logger: log,
        },
      );
    } catch (error: unknown) {
      log.warn({ err: error }, "Retrieval failed, continuing without context");
    }

    const passages = retrieved.filter((chunk) => guardrails.inspect("context", chunk.content).kind === "allow");
    if (passages.length < retrieved.length) {
      const flagged = retrieved.filter((chunk) => !passages.includes(chunk)).map((chunk) => chunk.chunkId);
      log.warn({ chunkIds: flagged }, "Dropped retrieved passages flagged by guardrails");
    }

    if (passages.length === 0 && retrieval.noContextPolicy === "decline") {
      trace.enter("Responded");
      return {
        status: "success",
        answer: guardrails.message("no_context"),
        sourceChunks: [],
        verdict: ALLOW,
        audit,
        trace: trace.states,
      };
    }

    const budgeted = fitPromptToBudget(
      text,
      passages,
      retrieval.contextBudgetTokens,
      retrieval.organizationalValues,
    );
    if (budgeted.dropped.length > 0) {
      log.debug({ dropped: budgeted.dropped.length }, "Context trimmed to token budget");
    }
    trace.enter("PromptBuilt");

    const response = await this.generate(budgeted.prompt, trace, options);
    if (!response.ok) {
      return { ...this.fallback(trace, response.afterFirstFragment), sourceChunks: budgeted.used, audit };
    }

    trace.enter("PostGuard");
    const answer = guardrails.sanitizeResponse(response.text);
    const post = guardrails.inspect("response", answer);
    trace.enter("Responded");

    if (post.kind !== "allow") {
      return {
        status: "blocked",
        answer: post.message,
        sourceChunks: budgeted.used,
        verdict: post,
        audit,
        trace: trace.states,
      };
    }
    return {
      status: "success",
      answer,
      sourceChunks: budgeted.used,
      verdict: ALLOW,
      audit,
      trace: trace.states,
    };
  }

  /**
   * A missing document or an unreachable index or store yields a `failed`
   * outcome carrying a canned message; the cause only goes to the log.
   */
  async analyzeDocument(documentId: string, mode: AnalysisMode): Promise<AnalysisOutcome> {
    const log = createChildLogger(this.logger, { requestId: randomUUID(), documentId });
    const trace = new RequestTrace(log);

    trace.enter("Received");
    try {
      return await this.runAnalysis(documentId, mode, trace);
    } catch (error: unknown) {
      const missing = error instanceof NotFoundError;
      if (missing) {
        log.warn({ err: error }, "Document not found for analysis");
      } else {
        log.error({ err: error }, "Analysis failed");
      }

      trace.enter("FallbackResponded");
      const verdict: GuardrailVerdict = missing
        ? { kind: "fallback", reason: NOT_FOUND, message: this.deps.guardrails.message(NOT_FOUND) }
        : this.deps.guardrails.unavailable();
      return { status: "failed", result: verdict.message, verdict, trace: trace.states };
    }
  }

  /**
   * Classifies every stored document, `concurrency` at a time, and returns
   * one row per document in store order.
   */
  async policyReport(options: PolicyReportOptions = {}): Promise<PolicyReportRow[]> {
    const concurrency = Math.max(1, options.concurrency ?? REPORT_CONCURRENCY);
    const documents = await this.deps.documentStore.list();
    const rows: PolicyReportRow[] = [];

    for (let start = 0; start < documents.length; start += concurrency) {
      const batch = await Promise.all(
        documents.slice(start, start + concurrency).map(async (document): Promise<PolicyReportRow> => {
          const outcome = await this.analyzeDocument(document.id, "classify");
          return {
            documentId: document.id,
            filename: document.metadata.filename ?? document.id,
            status: outcome.status,
            classification: outcome.classification,
          };
        }),
      );
      rows.push(...batch);
    }

    this.logger.info(
      { documents: rows.length, expired: rows.filter((row) => row.classification?.status === "expired").length },
      "Policy report completed",
    );
    return rows;
  }

  private async runAnalysis(documentId: string, mode: AnalysisMode, trace: RequestTrace): Promise<AnalysisOutcome> {
    const { guardrails } = this.deps;
    const document = await this.loadDocument(documentId);
    const content = document.text.slice(0, this.analysisMaxChars);

    trace.enter("PreGuard");
    const pre = guardrails.inspect("context", content);
    if (pre.kind !== "allow") {
      trace.enter("Responded");
      return { status: "blocked", result: pre.message, verdict: pre, trace: trace.states };
    }

    const prompt = mode === "classify" ? buildClassificationPrompt(content) : buildSummaryPrompt(content);
    trace.enter("PromptBuilt");

    const response = await this.generate(prompt, trace, {});
    if (!response.ok) {
      const { answer, ...rest } = this.fallback(trace, response.afterFirstFragment);
      return { ...rest, result: answer };
    }

    trace.enter("PostGuard");
    const result = guardrails.sanitizeResponse(response.text);
    const post = guardrails.inspect("response", result);
    trace.enter("Responded");

    if (post.kind !== "allow") {
      return { status: "blocked", result: post.message, verdict: post, trace: trace.states };
    }

    let classification: PolicyClassification | undefined;
    if (mode === "classify") {
      const duplicates = await this.deps.documentStore.findByContentHash(document.contentHash);
      classification = classifyPolicy(extractPolicyFields(result), {
        today: this.now().toISOString().slice(0, 10),
        duplicates: duplicates.filter((d) => d.id !== documentId).map((d) => d.metadata.filename ?? d.id),
      });
    }

    return { status: "success", result, verdict: ALLOW, classification, trace: trace.states };
  }

  /** Removes the document's index entries, then its stored text. */
  async deleteDocument(documentId: string): Promise<DeleteOutcome> {
    return this.locks.runExclusive(documentId, async () => {
      const removedChunks = await this.deps.vectorIndex.deleteDocument(documentId);
      const hadText = await this.deps.documentStore.delete(documentId);

      if (removedChunks === 0 && !hadText) {
        throw new NotFoundError(`Document ${documentId} not found`);
      }

      this.logger.info({ documentId, removedChunks }, "Document deleted");
      return { documentId, removedChunks };
    });
  }

  async health(): Promise<HealthReport> {
    const [indexReachable, embedderReachable, inferenceReachable] = await Promise.all([
      this.deps.vectorIndex.healthCheck(),
      this.deps.embeddingProvider.healthCheck(),
      this.deps.inference.healthCheck(),
    ]);
    return { indexReachable, embedderReachable, inferenceReachable };
  }

  /** Releases timers held by the inference circuit breaker. */
  close(): void {
    this.deps.inference.shutdown();
  }

  private async generate(prompt: string, trace: RequestTrace, options: QueryOptions): Promise<Generation> {
    trace.enter("Inferring");

    if (!options.stream) {
      const result = await this.deps.inference.complete(prompt, { signal: options.signal });
      return result.ok ? { ok: true, text: result.text } : { ok: false, afterFirstFragment: false };
    }

    const fragments: string[] = [];
    try {
      for await (const fragment of this.deps.inference.stream(prompt, { signal: options.signal })) {
        fragments.push(fragment);
      }
      return { ok: true, text: fragments.join("") };
    } catch (error: unknown) {
      this.logger.warn({ err: error, fragments: fragments.length }, "Inference stream failed");
      return { ok: false, afterFirstFragment: fragments.length > 0 };
    }
  }

  /** Canned response for an unreachable backend; late failures pass through PostGuard first. */
  private fallback(trace: RequestTrace, afterFirstFragment: boolean) {
    if (afterFirstFragment) trace.enter("PostGuard");
    trace.enter("FallbackResponded");
    const verdict = this.deps.guardrails.unavailable();
    return {
      status: "degraded" as const,
      answer: verdict.message,
      verdict,
      trace: trace.states,
    };
  }

  /** The stored text, or the document's chunks stitched back together. */
  private async loadDocument(documentId: string): Promise<Document> {
    const stored = await this.deps.documentStore.get(documentId);
    if (stored) return stored;

    const chunks = await this.deps.vectorIndex.getChunks(documentId);
    const [first] = chunks;
    if (!first) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }

    const text = reconstructText(
      chunks.map((chunk) => ({
        index: chunk.index,
        content: chunk.content,
        metadata: {
          startChar: chunk.metadata.startChar ?? 0,
          endChar: chunk.metadata.endChar ?? 0,
          overlap: 0,
          gapBefore: chunk.metadata.gapBefore,
          gapAfter: chunk.metadata.gapAfter,
        },
      })),
    );
    const { startChar: _startChar, endChar: _endChar, gapBefore: _gapBefore, gapAfter: _gapAfter, ...metadata } =
      first.metadata;

    return { id: documentId, text, metadata, contentHash: contentHash(text), ingestedAt: this.now() };
  }
}
