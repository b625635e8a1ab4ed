import type { Checkpoint, GuardrailVerdict } from "@docguard/types";

export interface IGuardrailCheck {
  readonly name: string;
  readonly checkpoints: ReadonlySet<Checkpoint>;

  /** Allow, or Block carrying the first matching reason category. */
  inspect(text: string): GuardrailVerdict;
  /** Every reason category the text matches, used for audit records. */
  categories(text: string): string[];
  /** Text with every match replaced by a placeholder. */
  redact(text: string): string;
}

export const REDACTED = "[REDACTED]";

export function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, "gi"));
}

export function matchesAny(patterns: readonly RegExp[], text: string): boolean {
  return patterns.some((pattern) => {
    pattern.lastIndex = 0;
    return pattern.test(text);
  });
}

export function replaceAll(patterns: readonly RegExp[], text: string): string {
  return patterns.reduce((acc, pattern) => acc.replace(pattern, REDACTED), text);
}
