import { summarize } from "./aggregator";
import type { BenchmarkConfig } from "./config";
import { AllProbesFailedError, NetworkFailureError } from "./errors";
import { probe as httpProbe } from "./probe";
import { ResultSet } from "./resultSet";
import type { BenchmarkOutcome, ProbeFailure, ProbeFn, RunResult } from "./types";
import type { Logger } from "./utils";

export interface OrchestratorDeps {
  probe?: ProbeFn;
  logger?: Logger;
}

/**
 * Fans probes out over `concurrency` workers.
 *
 * Without `totalSamples` every worker runs exactly one probe. With it, workers
 * keep reserving attempts until `totalSamples` attempts have been launched;
 * the reservation happens before the probe starts, so the run never makes
 * more attempts than requested. Failed attempts use up their slot.
 *
 * Aborting `config.probe.signal` cancels the run: in-flight probes are
 * aborted, and once they settle `run` rejects with the signal's reason.
 * A rejection that is not a NetworkFailureError is treated as a bug in the
 * probe and stops the run the same way failFast does.
 *
 * Probes only return values. The ResultSet is appended to from the
 * orchestrator's own continuation and sealed before `run` resolves.
 */
export class Orchestrator {
  private readonly config: BenchmarkConfig;
  private readonly probe: ProbeFn;
  private readonly logger?: Logger;

  constructor(config: BenchmarkConfig, deps: OrchestratorDeps = {}) {
    this.config = config;
    this.probe = deps.probe ?? httpProbe;
    this.logger = deps.logger;
  }

  async run(): Promise<RunResult> {
    const { url, concurrency, totalSamples, errorPolicy } = this.config;
    const requested = totalSamples ?? concurrency;
    const workerCount = Math.min(concurrency, requested);

    const samples = new ResultSet();
    const failures: ProbeFailure[] = [];
    const controller = new AbortController();
    const callerSignal = this.config.probe.signal;
    const fatalErrors: unknown[] = [];
    let launched = 0;
    let completed = 0;

    const stop = (error: unknown) => {
      fatalErrors.push(error);
      controller.abort();
    };

    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    this.logger?.log(
      `Starting ${requested} probes against ${url} with ${workerCount} concurrent workers (${errorPolicy})`
    );

    const attempt = async (index: number): Promise<void> => {
      try {
        const measurement = await this.probe(url, { ...this.config.probe, signal: controller.signal });
        if (!controller.signal.aborted) {
          samples.add(measurement);
        }
      } catch (error) {
        // Whatever fails after the run was stopped is fallout of the stop
        if (controller.signal.aborted) {
          return;
        }
        if (!(error instanceof NetworkFailureError)) {
          this.logger?.error(`Probe ${index} threw an unexpected error, aborting run`, String(error));
          stop(error);
          return;
        }
        if (errorPolicy === "failFast") {
          this.logger?.error(`Probe ${index} failed, aborting run: ${error.message}`);
          stop(error);
          return;
        }
        this.logger?.warn(`Probe ${index} failed: ${error.message}`);
        failures.push({ attempt: index, error });
      }

      completed++;
      if (completed % 10 === 0 || completed === requested) {
        this.logger?.log(`Progress: ${completed}/${requested}`);
      }
    };

    const worker = async (): Promise<void> => {
      while (launched < requested && !controller.signal.aborted) {
        const index = launched++;
        await attempt(index);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    callerSignal?.removeEventListener("abort", onCallerAbort);
    samples.seal();

    callerSignal?.throwIfAborted();
    if (fatalErrors.length > 0) {
      throw fatalErrors[0];
    }
    return { requested, samples, failures };
  }
}

/**
 * Runs the benchmark and reduces it to per-phase means.
 */
export async function runBenchmark(
  config: BenchmarkConfig,
  deps: OrchestratorDeps = {}
): Promise<BenchmarkOutcome> {
  const result = await new Orchestrator(config, deps).run();

  if (result.samples.size === 0) {
    throw new AllProbesFailedError(result.requested, result.failures.length, result.failures[0]?.error);
  }

  return {
    summary: summarize(result.samples),
    succeeded: result.samples.size,
    failed: result.failures.length,
    failures: result.failures,
  };
}
