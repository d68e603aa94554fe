#!/usr/bin/env node
import { createConfig } from "./config";
import { AllProbesFailedError, BenchmarkError, InvalidInputError, NetworkFailureError } from "./errors";
import { runBenchmark } from "./orchestrator";
import type { OrchestratorDeps } from "./orchestrator";
import { formatSummary } from "./report";
import { getArgs, Logger } from "./utils";

const USAGE = `Usage: http-phase-bench [OPTIONS] url

Options:
  -c <n>              number of concurrent connections (required)
  -n <n>              total number of samples (default: one per connection)
  --collect-errors    record failed probes and keep going instead of aborting
  --timeout <ms>      socket idle timeout per probe
  --log <file>        also append log lines to <file>
  -h, --help          show this help
`;

function describeFailure(error: unknown): string {
  if (error instanceof AllProbesFailedError) {
    const cause = error.cause instanceof NetworkFailureError ? ` (first failure: ${error.cause.message})` : "";
    return `${error.message}${cause}`;
  }
  if (error instanceof BenchmarkError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export async function main(argv: string[], deps: OrchestratorDeps = {}): Promise<number> {
  const args = getArgs(argv);

  if (args.help || !args.url) {
    process.stdout.write(USAGE);
    return args.help ? 0 : 1;
  }

  const logger = deps.logger ?? new Logger(args.logFile, { quiet: !args.logFile });

  try {
    const config = createConfig({
      url: args.url,
      concurrency: args.concurrency,
      totalSamples: args.totalSamples,
      errorPolicy: args.collectErrors ? "collectErrors" : "failFast",
      probe: { timeoutMs: args.timeoutMs },
    });
    const outcome = await runBenchmark(config, { ...deps, logger });
    process.stdout.write(formatSummary(outcome));
    return 0;
  } catch (error) {
    logger.error(describeFailure(error));
    if (error instanceof InvalidInputError) {
      process.stdout.write(USAGE);
      return 1;
    }
    return 2;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("Error:", error instanceof Error ? error.message : error);
      process.exit(2);
    }
  );
}
