export { summarize, PHASE_FIELDS } from "./aggregator";
export { createConfig, normalizeUrl } from "./config";
export type { BenchmarkConfig, BenchmarkInput } from "./config";
export {
  AllProbesFailedError,
  BenchmarkError,
  EmptyResultSetError,
  InvalidInputError,
  NetworkFailureError,
} from "./errors";
export { Orchestrator, runBenchmark } from "./orchestrator";
export type { OrchestratorDeps } from "./orchestrator";
export { derivePhases, probe } from "./probe";
export { formatSeconds, formatSummary } from "./report";
export { ResultSet } from "./resultSet";
export type {
  BenchmarkOutcome,
  Checkpoints,
  Clock,
  Duration,
  ErrorPolicy,
  PhaseMeasurement,
  ProbeFailure,
  ProbeFn,
  ProbeOptions,
  ProbeStage,
  RunResult,
  SummaryReport,
} from "./types";
export { Logger } from "./utils";
