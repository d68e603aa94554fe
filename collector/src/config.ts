import { InvalidInputError } from "./errors";
import type { ErrorPolicy, ProbeOptions } from "./types";

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const SUPPORTED_PROTOCOLS = ["http:", "https:"];

export interface BenchmarkConfig {
  url: string;
  concurrency: number;
  totalSamples?: number;
  errorPolicy: ErrorPolicy;
  probe: ProbeOptions;
}

export interface BenchmarkInput {
  url?: string;
  concurrency?: number;
  totalSamples?: number;
  errorPolicy?: ErrorPolicy;
  probe?: ProbeOptions;
}

export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidInputError("No URL provided");
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new InvalidInputError(`Invalid URL: ${raw}`);
  }

  if (!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {
    throw new InvalidInputError(`Unsupported protocol ${parsed.protocol} (only http and https)`);
  }
  return parsed.toString();
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer, got ${value}`);
  }
}

export function createConfig(input: BenchmarkInput): BenchmarkConfig {
  const url = normalizeUrl(input.url ?? "");

  if (input.concurrency === undefined) {
    throw new InvalidInputError("Number of connections is required");
  }
  assertPositiveInteger("concurrency", input.concurrency);

  if (input.totalSamples !== undefined) {
    assertPositiveInteger("totalSamples", input.totalSamples);
  }

  const probe = { ...input.probe };
  if (probe.timeoutMs !== undefined) {
    assertPositiveInteger("timeoutMs", probe.timeoutMs);
  }
  if (probe.handshakeTimeoutMs !== undefined) {
    assertPositiveInteger("handshakeTimeoutMs", probe.handshakeTimeoutMs);
  }

  return {
    url,
    concurrency: input.concurrency,
    totalSamples: input.totalSamples,
    errorPolicy: input.errorPolicy ?? "failFast",
    probe,
  };
}
