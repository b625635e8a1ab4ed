import type { Checkpoint, GuardrailVerdict } from "@docguard/types";
import type { IGuardrailCheck } from "./check.interface.js";
import { compilePatterns, matchesAny, replaceAll } from "./check.interface.js";
import type { FallbackMessages } from "./messages.js";

export const PROMPT_INJECTION = "prompt_injection";

/**
 * Instruction-override heuristics. Runs on the user's query and on every
 * retrieved passage, since uploaded documents are untrusted too.
 */
export class PromptInjectionCheck implements IGuardrailCheck {
  readonly name = "prompt-injection";
  readonly checkpoints: ReadonlySet<Checkpoint> = new Set<Checkpoint>(["query", "context"]);
  private readonly patterns: RegExp[];

  constructor(
    sources: string[],
    private readonly messages: FallbackMessages,
  ) {
    this.patterns = compilePatterns(sources);
  }

  inspect(text: string): GuardrailVerdict {
    if (!matchesAny(this.patterns, text)) return { kind: "allow" };
    return { kind: "block", reason: PROMPT_INJECTION, message: this.messages.get(PROMPT_INJECTION) };
  }

  categories(text: string): string[] {
    return matchesAny(this.patterns, text) ? [PROMPT_INJECTION] : [];
  }

  redact(text: string): string {
    return replaceAll(this.patterns, text);
  }
}
