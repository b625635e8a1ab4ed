import { DimensionMismatchError, EmptyInputError, AppError } from "@docguard/errors";

export function assertNonBlank(texts: string[]): void {
  if (texts.length === 0) {
    throw new EmptyInputError("Nothing to embed: received an empty batch");
  }
  const blank = texts.findIndex((t) => t.trim().length === 0);
  if (blank >= 0) {
    throw new EmptyInputError(`Cannot embed blank text (batch position ${String(blank)})`, {
      details: { position: blank },
    });
  }
}

export function assertEmbeddings(
  embeddings: number[][],
  expectedCount: number,
  dimensions: number,
  provider: string,
): void {
  if (embeddings.length !== expectedCount) {
    throw new AppError({
      message: `${provider} returned ${String(embeddings.length)} embeddings for ${String(expectedCount)} inputs`,
      statusCode: 502,
      code: "EMBEDDING_COUNT_MISMATCH",
    });
  }
  for (const vector of embeddings) {
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length, { details: { provider } });
    }
  }
}
