import type { AuditRecord, Checkpoint, GuardrailRules, GuardrailVerdict } from "@docguard/types";
import type { Logger } from "@docguard/logger";
import type { IGuardrailCheck } from "./check.interface.js";
import { DisallowedContentCheck } from "./disallowed-content.js";
import { PromptInjectionCheck } from "./prompt-injection.js";
import { OutputSanityCheck } from "./output-sanity.js";
import { FallbackMessages } from "./messages.js";

export const UNAVAILABLE = "unavailable";

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Runs the configured checks in priority order; the first non-Allow verdict
 * wins. The rule set is fixed at construction.
 */
export class GuardrailEngine {
  private readonly disclaimers: RegExp[];

  constructor(
    private readonly checks: readonly IGuardrailCheck[],
    private readonly messages: FallbackMessages,
    disclaimers: readonly string[] = [],
    private readonly logger?: Logger,
  ) {
    this.disclaimers = disclaimers.map(
      (phrase) => new RegExp(`${escapeRegExp(phrase)}[,.:;]?\\s*`, "gi"),
    );
  }

  inspect(checkpoint: Checkpoint, text: string): GuardrailVerdict {
    for (const check of this.checks) {
      if (!check.checkpoints.has(checkpoint)) continue;

      const verdict = check.inspect(text);
      if (verdict.kind !== "allow") {
        this.logger?.info({ checkpoint, check: check.name, reason: verdict.reason }, "Guardrail blocked text");
        return verdict;
      }
    }
    return { kind: "allow" };
  }

  /**
   * Every category the text trips at the query checkpoint, plus the text with
   * matches redacted. Never blocks on its own.
   */
  audit(text: string): AuditRecord {
    const applicable = this.checks.filter((check) => check.checkpoints.has("query"));
    const flaggedCategories = [...new Set(applicable.flatMap((check) => check.categories(text)))];
    const sanitizedText = applicable.reduce((acc, check) => check.redact(acc), text);

    return {
      isFlagged: flaggedCategories.length > 0,
      flaggedCategories,
      sanitizedText,
      timestamp: new Date().toISOString(),
    };
  }

  /** Strips boilerplate disclaimers from a model answer before the response checkpoint. */
  sanitizeResponse(text: string): string {
    return this.disclaimers.reduce((acc, pattern) => acc.replace(pattern, ""), text).trim();
  }

  /** Canned verdict for a confirmed backend outage. */
  unavailable(reason = UNAVAILABLE): Extract<GuardrailVerdict, { kind: "fallback" }> {
    return { kind: "fallback", reason, message: this.messages.get(reason) };
  }

  message(reason: string): string {
    return this.messages.get(reason);
  }
}

export interface GuardrailEngineOptions {
  logger?: Logger;
}

/** Builds the reference check set, in priority order, from a validated rule file. */
export function createGuardrailEngine(rules: GuardrailRules, options: GuardrailEngineOptions = {}): GuardrailEngine {
  const messages = new FallbackMessages(rules.messages);
  const checks: IGuardrailCheck[] = [
    new DisallowedContentCheck(rules.blocklist, messages),
    new PromptInjectionCheck(rules.injectionPatterns, messages),
    new OutputSanityCheck(messages),
  ];
  return new GuardrailEngine(checks, messages, rules.disclaimers, options.logger);
}
