import { describe, it, expect } from "vitest";
import { redactValue, redactText, previewText, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "secret123")).toBe("[REDACTED]");
      expect(redactValue("token", "jwt-token")).toBe("[REDACTED]");
      expect(redactValue("apikey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("api_key", "test-key")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Bearer xyz")).toBe("[REDACTED]");
      expect(redactValue("ssn", "123-45-6789")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "secret123")).toBe("[REDACTED]");
      expect(redactValue("ApiKey", "test-key")).toBe("[REDACTED]");
    });

    it("redacts e-mail addresses in string values", () => {
      expect(redactValue("message", "Contact user@example.com for details")).toBe(
        "Contact [REDACTED] for details",
      );
    });

    it("redacts multiple e-mail addresses", () => {
      expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    });

    it("leaves non-string values for non-sensitive keys alone", () => {
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("active", true)).toBe(true);
      expect(redactValue("data", null)).toBe(null);
      expect(redactValue("name", "")).toBe("");
    });
  });

  describe("redactText", () => {
    it("redacts social security numbers", () => {
      expect(redactText("My SSN is 123-45-6789, thanks")).toBe("My SSN is [REDACTED], thanks");
    });

    it("redacts the same pattern twice in a row", () => {
      expect(redactText("a@b.com")).toBe("[REDACTED]");
      expect(redactText("a@b.com")).toBe("[REDACTED]");
    });
  });

  describe("previewText", () => {
    it("keeps short text whole", () => {
      expect(previewText("What color is the sky?")).toBe("What color is the sky?");
    });

    it("truncates long text to the limit", () => {
      expect(previewText("abcdefghij", 4)).toBe("abcd...");
    });

    it("redacts before truncating", () => {
      expect(previewText("mail me at someone@example.org please", 20)).toBe(
        "mail me at [REDACTED...",
      );
    });
  });

  describe("REDACT_PATHS", () => {
    it("has both top-level and nested for each sensitive key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
    });
  });
});
