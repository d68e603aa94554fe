import { EmptyResultSetError } from "./errors";
import { ResultSet } from "./resultSet";
import type { PhaseMeasurement, SummaryReport } from "./types";

export const PHASE_FIELDS: readonly (keyof PhaseMeasurement)[] = [
  "dnsLookup",
  "tcpConnection",
  "connectionAcquisition",
  "serverProcessing",
  "contentTransfer",
  "total",
];

function emptyMeasurement(): PhaseMeasurement {
  return {
    dnsLookup: 0n,
    tcpConnection: 0n,
    connectionAcquisition: 0n,
    serverProcessing: 0n,
    contentTransfer: 0n,
    total: 0n,
  };
}

/**
 * Per-phase arithmetic mean. Division is bigint division, so every mean is
 * truncated to whole nanoseconds.
 */
export function summarize(samples: ResultSet | readonly PhaseMeasurement[]): SummaryReport {
  const values = samples instanceof ResultSet ? samples.values() : samples;
  if (values.length === 0) {
    throw new EmptyResultSetError();
  }

  const sums = emptyMeasurement();
  for (const sample of values) {
    for (const field of PHASE_FIELDS) {
      sums[field] += sample[field];
    }
  }

  const count = BigInt(values.length);
  const summary = emptyMeasurement();
  for (const field of PHASE_FIELDS) {
    summary[field] = sums[field] / count;
  }
  return summary;
}
