import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { GuardrailRules } from "@docguard/types";
import { ConfigurationError } from "@docguard/errors";

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, "i");
    return true;
  } catch {
    return false;
  }
}

const patternSchema = z
  .string()
  .min(1)
  .refine(isValidRegex, (source) => ({ message: `Invalid regular expression: ${source}` }));

export const guardrailRulesSchema = z.object({
  blocklist: z.record(z.string().min(1), z.array(patternSchema)),
  injectionPatterns: z.array(patternSchema),
  disclaimers: z.array(z.string().min(1)).default([]),
  messages: z
    .record(z.string().min(1), z.string().min(1))
    .refine((messages) => "default" in messages, {
      message: 'messages must define a "default" entry',
    }),
});

/**
 * Validate an already-decoded rule object.
 */
export function parseGuardrailRules(raw: unknown, source = "<inline>"): GuardrailRules {
  const result = guardrailRulesSchema.safeParse(raw);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid guardrail rules in ${source}: ${summary}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Read and validate the guardrail rule file. Called once at startup; the
 * resulting rule set is never reloaded mid-request.
 */
export async function loadGuardrailRules(path: string): Promise<GuardrailRules> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read guardrail rules file ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error: unknown) {
    throw new ConfigurationError(`Guardrail rules file ${path} is not valid JSON`, {
      cause: error,
    });
  }

  return parseGuardrailRules(raw, path);
}
