import fs from "node:fs";
import minimist from "minimist";
import type { Args } from "./types";

type LogLevel = "INFO" | "WARN" | "ERROR";

export class Logger {
  private logFile?: string;
  private quiet: boolean;

  constructor(logFile?: string, { quiet = false }: { quiet?: boolean } = {}) {
    this.logFile = logFile;
    this.quiet = quiet;
    // Create file if not exists
    if (logFile && !fs.existsSync(logFile)) {
      fs.writeFileSync(logFile, "");
    }
  }

  private write(level: LogLevel, message: string, ...args: unknown[]) {
    if (level === "INFO" && this.quiet) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}${args.length ? ` ${JSON.stringify(args)}` : ""}`;

    // Console output
    if (level === "ERROR") {
      console.error(logMessage);
    } else if (level === "WARN") {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }

    // File output
    if (this.logFile) {
      fs.appendFileSync(this.logFile, logMessage + "\n");
    }
  }

  log(message: string, ...args: unknown[]) {
    this.write("INFO", message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write("WARN", message, ...args);
  }

  error(message: string, ...args: unknown[]) {
    this.write("ERROR", message, ...args);
  }
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    return Number(value);
  }
  return undefined;
}

function toString(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

export function getArgs(argv: string[] = process.argv.slice(2)): Args {
  const args = minimist(argv, {
    string: ["c", "n", "timeout", "log"],
    boolean: ["collect-errors", "help"],
    alias: { h: "help" },
  });

  return {
    url: toString(args._[0]),
    concurrency: toNumber(args.c),
    totalSamples: toNumber(args.n),
    collectErrors: args["collect-errors"] === true,
    timeoutMs: toNumber(args.timeout),
    logFile: toString(args.log) || undefined,
    help: args.help === true,
  };
}
