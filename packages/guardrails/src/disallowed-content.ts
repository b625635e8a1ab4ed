import type { Checkpoint, GuardrailVerdict } from "@docguard/types";
import type { IGuardrailCheck } from "./check.interface.js";
import { compilePatterns, matchesAny, replaceAll } from "./check.interface.js";
import type { FallbackMessages } from "./messages.js";

/** Blocklist of categories, each a list of case-insensitive patterns. */
export class DisallowedContentCheck implements IGuardrailCheck {
  readonly name = "disallowed-content";
  readonly checkpoints: ReadonlySet<Checkpoint> = new Set<Checkpoint>(["query", "response"]);
  private readonly categoryPatterns: ReadonlyArray<readonly [string, RegExp[]]>;

  constructor(
    blocklist: Record<string, string[]>,
    private readonly messages: FallbackMessages,
  ) {
    this.categoryPatterns = Object.entries(blocklist).map(
      ([category, sources]) => [category, compilePatterns(sources)] as const,
    );
  }

  inspect(text: string): GuardrailVerdict {
    const [reason] = this.categories(text);
    if (reason === undefined) return { kind: "allow" };
    return { kind: "block", reason, message: this.messages.get(reason) };
  }

  categories(text: string): string[] {
    return this.categoryPatterns
      .filter(([, patterns]) => matchesAny(patterns, text))
      .map(([category]) => category);
  }

  redact(text: string): string {
    return this.categoryPatterns.reduce((acc, [, patterns]) => replaceAll(patterns, acc), text);
  }
}
