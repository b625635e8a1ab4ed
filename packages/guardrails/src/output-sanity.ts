import type { Checkpoint, GuardrailVerdict } from "@docguard/types";
import type { IGuardrailCheck } from "./check.interface.js";
import type { FallbackMessages } from "./messages.js";

export const OUTPUT_SANITY = "output_sanity";

const REPLACEMENT_CHAR = "\uFFFD";
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Rejects empty model output and output that did not decode cleanly as UTF-8. */
export class OutputSanityCheck implements IGuardrailCheck {
  readonly name = "output-sanity";
  readonly checkpoints: ReadonlySet<Checkpoint> = new Set<Checkpoint>(["response"]);

  constructor(private readonly messages: FallbackMessages) {}

  inspect(text: string): GuardrailVerdict {
    if (this.isSane(text)) return { kind: "allow" };
    return { kind: "block", reason: OUTPUT_SANITY, message: this.messages.get(OUTPUT_SANITY) };
  }

  categories(text: string): string[] {
    return this.isSane(text) ? [] : [OUTPUT_SANITY];
  }

  redact(text: string): string {
    return text;
  }

  private isSane(text: string): boolean {
    return text.trim().length > 0 && !text.includes(REPLACEMENT_CHAR) && !LONE_SURROGATE.test(text);
  }
}
