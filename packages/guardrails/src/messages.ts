/**
 * User-safe refusal and fallback texts keyed by reason category. Unknown
 * reasons resolve to the "default" entry.
 */
export class FallbackMessages {
  private readonly table: ReadonlyMap<string, string>;
  private readonly fallback: string;

  constructor(messages: Record<string, string>) {
    this.table = new Map(Object.entries(messages));
    this.fallback = messages["default"] ?? "I'm unable to provide a response to that query";
  }

  get(reason: string): string {
    return this.table.get(reason) ?? this.fallback;
  }
}
