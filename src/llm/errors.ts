/**
 * Classified failures of a generation call. Every one of them is terminal for
 * the request that caused it.
 */

export type GenerationErrorKind = "upstream" | "network" | "malformed" | "timeout";

export class GenerationError extends Error {
  constructor(
    message: string,
    readonly kind: GenerationErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class UpstreamError extends GenerationError {
  constructor(readonly status: number, detail = "") {
    super(`Upstream returned ${status}${detail ? `: ${detail}` : ""}`, "upstream");
    this.name = "UpstreamError";
  }
}

export class NetworkError extends GenerationError {
  constructor(cause: unknown) {
    super(
      `Network error: ${cause instanceof Error ? cause.message : String(cause)}`,
      "network",
      { cause }
    );
    this.name = "NetworkError";
  }
}

export class MalformedResponseError extends GenerationError {
  constructor(detail: string) {
    super(`Malformed upstream response: ${detail}`, "malformed");
    this.name = "MalformedResponseError";
  }
}

export class TimeoutError extends GenerationError {
  constructor(readonly timeoutMs: number) {
    super(`Upstream call timed out after ${timeoutMs}ms`, "timeout");
    this.name = "TimeoutError";
  }
}

/** Wrap anything thrown by a client into a GenerationError. */
export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  return new NetworkError(err);
}
