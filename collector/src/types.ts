import type { Agent } from "node:http";
import type { LookupFunction } from "node:net";
import type { NetworkFailureError } from "./errors";
import type { ResultSet } from "./resultSet";

// All durations and timestamps are integer nanoseconds
export type Duration = bigint;

export interface PhaseMeasurement {
  dnsLookup: Duration; // Time to resolve the host name
  tcpConnection: Duration; // Time to establish the TCP connection (after DNS)
  connectionAcquisition: Duration; // Connection established -> handed to the request (TLS lands here)
  serverProcessing: Duration; // Connection handed over -> first response byte
  contentTransfer: Duration; // First byte -> body fully read
  total: Duration;
}

export type SummaryReport = PhaseMeasurement;

export interface Checkpoints {
  dnsStart?: bigint;
  dnsDone?: bigint;
  connectStart?: bigint;
  connDone?: bigint;
  gotConn?: bigint;
  firstByte?: bigint;
  done: bigint;
}

export type ProbeStage = "dns" | "connect" | "tls" | "request" | "transfer";

export type Clock = () => bigint;

export interface ProbeOptions {
  timeoutMs?: number;
  handshakeTimeoutMs?: number;
  lookup?: LookupFunction;
  agent?: Agent;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  clock?: Clock;
}

export type ProbeFn = (url: string, options: ProbeOptions) => Promise<PhaseMeasurement>;

export type ErrorPolicy = "failFast" | "collectErrors";

export interface ProbeFailure {
  attempt: number;
  error: NetworkFailureError;
}

export interface RunResult {
  requested: number;
  samples: ResultSet;
  failures: ProbeFailure[];
}

export interface BenchmarkOutcome {
  summary: SummaryReport;
  succeeded: number;
  failed: number;
  failures: ProbeFailure[];
}

export interface Args {
  url?: string;
  concurrency?: number;
  totalSamples?: number;
  collectErrors?: boolean;
  timeoutMs?: number;
  logFile?: string;
  help?: boolean;
}
