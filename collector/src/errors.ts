import type { ProbeStage } from "./types";

export type BenchmarkErrorCode =
  | "INVALID_INPUT"
  | "NETWORK_FAILURE"
  | "EMPTY_RESULT_SET"
  | "ALL_PROBES_FAILED";

export class BenchmarkError extends Error {
  readonly code: BenchmarkErrorCode;

  constructor(code: BenchmarkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenchmarkError";
    this.code = code;
  }
}

/**
 * Rejected configuration. Raised before any request is issued.
 */
export class InvalidInputError extends BenchmarkError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/**
 * A single probe failed while resolving, connecting, handshaking or reading.
 */
export class NetworkFailureError extends BenchmarkError {
  readonly stage: ProbeStage;
  readonly url: string;

  constructor(stage: ProbeStage, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("NETWORK_FAILURE", `${stage} failed for ${url}: ${reason}`, { cause });
    this.name = "NetworkFailureError";
    this.stage = stage;
    this.url = url;
  }
}

export class EmptyResultSetError extends BenchmarkError {
  constructor() {
    super("EMPTY_RESULT_SET", "Cannot summarize an empty result set");
    this.name = "EmptyResultSetError";
  }
}

export class AllProbesFailedError extends BenchmarkError {
  readonly requested: number;
  readonly failed: number;

  constructor(requested: number, failed: number, cause?: unknown) {
    super(
      "ALL_PROBES_FAILED",
      `All probes failed: 0 of ${requested} requested samples succeeded, ${failed} failed`,
      { cause }
    );
    this.name = "AllProbesFailedError";
    this.requested = requested;
    this.failed = failed;
  }
}

export function toNetworkFailure(error: unknown, stage: ProbeStage, url: string): NetworkFailureError {
  if (error instanceof NetworkFailureError) {
    return error;
  }
  return new NetworkFailureError(stage, url, error);
}
