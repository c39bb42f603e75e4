export class VectorizationError extends Error {
  readonly reason: "empty_text" | "zero_vector" | "upstream" | "dimension_mismatch";

  constructor(
    reason: VectorizationError["reason"],
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VectorizationError";
    this.reason = reason;
  }
}

/**
 * Turns text into a fixed-length feature vector. Implementations must keep the
 * vector space stable across calls (no refitting per request) and reject input
 * that would produce a zero vector.
 */
export interface Vectorizer {
  readonly vendor: string;
  readonly dimensions: number;
  vectorize(text: string): Promise<number[]>;
}
