import type { PolicyClassification, PolicyFinding } from "@docguard/types";

/** Longest slice of a document handed to the model for analysis. */
export const ANALYSIS_MAX_CHARS = 8000;

export function buildSummaryPrompt(documentText: string): string {
  return [
    "Summarize the following document in two or three sentences.",
    "Describe only what the document says.",
    "",
    "Document Content:",
    documentText,
    "",
    "Summary:",
  ].join("\n");
}

export function buildClassificationPrompt(documentText: string): string {
  return `You review organizational policy documents.

From the document below, extract:
1. Metadata: the exact policy title, its created, last updated and expiration dates, and its version.
2. Content: outdated elements (an expiration date in the past, or references to superseded regulations), the key topics, and the main sections.

Document Content:
${documentText}

Reply with exactly these lines, leaving a value empty when it is not present:

TITLE: [Full policy title]
CREATED_DATE: [YYYY-MM-DD]
UPDATED_DATE: [YYYY-MM-DD]
EXPIRATION_DATE: [YYYY-MM-DD]
VERSION: [Version number]
KEY_TOPICS: [Comma-separated topics]
MAIN_SECTIONS: [Comma-separated section titles]
OUTDATED_ELEMENTS: [Outdated elements, if any]
POLICY_SUMMARY: [Two or three sentence summary]`;
}

export interface PolicyFields {
  title: string;
  createdDate: string;
  updatedDate: string;
  expirationDate: string;
  version: string;
  keyTopics: string;
  mainSections: string;
  outdatedElements: string;
  summary: string;
}

const FIELD_LABELS: Record<keyof PolicyFields, string> = {
  title: "TITLE",
  createdDate: "CREATED_DATE",
  updatedDate: "UPDATED_DATE",
  expirationDate: "EXPIRATION_DATE",
  version: "VERSION",
  keyTopics: "KEY_TOPICS",
  mainSections: "MAIN_SECTIONS",
  outdatedElements: "OUTDATED_ELEMENTS",
  summary: "POLICY_SUMMARY",
};

const EMPTY_MARKERS: ReadonlySet<string> = new Set(["", "none", "n/a", "na", "not found", "not available", "-"]);

function cleanValue(raw: string): string {
  const value = raw.trim().replace(/^\[(.*)\]$/, "$1").trim();
  return EMPTY_MARKERS.has(value.toLowerCase()) ? "" : value;
}

/** Reads `LABEL: value` lines from a model reply; missing labels become "". */
export function extractPolicyFields(reply: string): PolicyFields {
  const fields: PolicyFields = {
    title: "",
    createdDate: "",
    updatedDate: "",
    expirationDate: "",
    version: "",
    keyTopics: "",
    mainSections: "",
    outdatedElements: "",
    summary: "",
  };

  for (const key of Object.keys(FIELD_LABELS)) {
    if (!isFieldKey(key)) continue;
    const match = new RegExp(`^[ \\t]*\\**${FIELD_LABELS[key]}\\**[ \\t]*:[ \\t]*(.*)$`, "im").exec(reply);
    fields[key] = match?.[1] === undefined ? "" : cleanValue(match[1]);
  }

  return fields;
}

function isFieldKey(key: string): key is keyof PolicyFields {
  return key in FIELD_LABELS;
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

function monthNumber(name: string): number | undefined {
  const index = MONTHS.indexOf(name.toLowerCase());
  return index === -1 ? undefined : index + 1;
}

function isoDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Parses the date formats policy documents use and returns `YYYY-MM-DD`.
 * Slash dates are read month-first, falling back to day-first when the
 * month-first reading is impossible.
 */
export function parsePolicyDate(raw: string): string | undefined {
  const text = raw.trim();
  let m: RegExpExecArray | null;

  if ((m = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text))) {
    return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));
  }
  if ((m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text))) {
    return isoDate(Number(m[3]), Number(m[1]), Number(m[2])) ?? isoDate(Number(m[3]), Number(m[2]), Number(m[1]));
  }
  if ((m = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/.exec(text))) {
    return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));
  }
  if ((m = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/.exec(text))) {
    const month = monthNumber(m[1] ?? "");
    return month === undefined ? undefined : isoDate(Number(m[3]), month, Number(m[2]));
  }
  if ((m = /^(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})$/.exec(text))) {
    const month = monthNumber(m[2] ?? "");
    return month === undefined ? undefined : isoDate(Number(m[3]), month, Number(m[1]));
  }
  return undefined;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export interface ClassificationContext {
  /** Today as `YYYY-MM-DD`. */
  today: string;
  /** Names of other stored documents with identical content. */
  duplicates: string[];
}

export function classifyPolicy(fields: PolicyFields, context: ClassificationContext): PolicyClassification {
  const expiration = parsePolicyDate(fields.expirationDate);
  const expired = expiration !== undefined && expiration < context.today;
  const findings: PolicyFinding[] = [];

  if (expired) {
    findings.push({
      issueType: "Outdated Policy",
      description: `Policy has expired on ${fields.expirationDate}`,
      suggestedAction: "Review and update policy with new expiration date",
      priority: "High",
    });
  }

  if (fields.outdatedElements) {
    findings.push({
      issueType: "Outdated Content",
      description: fields.outdatedElements,
      suggestedAction: "Update policy content to meet current standards",
      priority: "Medium",
    });
  }

  if (context.duplicates.length > 0) {
    findings.push({
      issueType: "Redundant Policy",
      description: `This policy is identical or very similar to: ${context.duplicates.join(", ")}`,
      suggestedAction: "Consider consolidating redundant policies",
      priority: "Medium",
    });
  }

  return {
    title: fields.title,
    createdDate: fields.createdDate,
    updatedDate: fields.updatedDate,
    expirationDate: fields.expirationDate,
    version: fields.version,
    keyTopics: splitList(fields.keyTopics),
    mainSections: splitList(fields.mainSections),
    outdatedElements: fields.outdatedElements,
    summary: fields.summary,
    status: expired ? "expired" : "current",
    findings,
  };
}
