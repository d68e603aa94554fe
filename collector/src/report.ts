import type { BenchmarkOutcome, Duration, PhaseMeasurement } from "./types";

const NANOS_PER_SECOND = 1_000_000_000n;

const REPORT_LINES: [label: string, field: keyof PhaseMeasurement][] = [
  ["Average request time", "total"],
  ["DNS Lookup", "dnsLookup"],
  ["TCP Connection", "tcpConnection"],
  ["Connection Acquisition", "connectionAcquisition"],
  ["Server Processing", "serverProcessing"],
  ["Content Transfer", "contentTransfer"],
];

// Decimal seconds without float rounding, e.g. 200000000n -> "0.2s"
export function formatSeconds(duration: Duration): string {
  const sign = duration < 0n ? "-" : "";
  const abs = duration < 0n ? -duration : duration;
  const whole = abs / NANOS_PER_SECOND;
  const fraction = (abs % NANOS_PER_SECOND).toString().padStart(9, "0").replace(/0+$/, "");
  return `${sign}${whole}${fraction ? `.${fraction}` : ""}s`;
}

export function formatSummary(outcome: BenchmarkOutcome): string {
  const lines = REPORT_LINES.map(([label, field]) => `${label}: ${formatSeconds(outcome.summary[field])}`);
  if (outcome.failed > 0) {
    lines.push(`Failed probes: ${outcome.failed}/${outcome.succeeded + outcome.failed}`);
  }
  return lines.join("\n") + "\n";
}
