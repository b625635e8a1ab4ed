export type Checkpoint = "query" | "context" | "response";

export type GuardrailVerdict =
  | { kind: "allow" }
  | { kind: "block"; reason: string; message: string }
  | { kind: "fallback"; reason: string; message: string };

export interface AuditRecord {
  isFlagged: boolean;
  flaggedCategories: string[];
  sanitizedText: string;
  timestamp: string;
}

export interface GuardrailRules {
  /** Category name to case-insensitive regex sources. */
  blocklist: Record<string, string[]>;
  injectionPatterns: string[];
  disclaimers: string[];
  /** Reason category to user-safe message; "default" is used for unknown reasons. */
  messages: Record<string, string>;
}
