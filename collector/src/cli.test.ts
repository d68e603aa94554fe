import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import { main } from "./cli";
import { NetworkFailureError } from "./errors";
import type { PhaseMeasurement, ProbeFn } from "./types";
import { Logger } from "./utils";

const measurement: PhaseMeasurement = {
  dnsLookup: 200_000_000n,
  tcpConnection: 200_000_000n,
  connectionAcquisition: 0n,
  serverProcessing: 200_000_000n,
  contentTransfer: 400_000_000n,
  total: 1_000_000_000n,
};

const unresolvable: ProbeFn = (url) =>
  Promise.reject(new NetworkFailureError("dns", url, new Error("getaddrinfo ENOTFOUND bench.test")));

describe("http-phase-bench cli", () => {
  let output: string;
  let logger: Logger;

  beforeEach(() => {
    output = "";
    jest.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
      output += String(chunk);
      return true;
    });
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    logger = new Logger(undefined, { quiet: true });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("prints the averaged phases", async () => {
    const probe = jest.fn<ProbeFn>(async () => measurement);

    const code = await main(["-c", "3", "bench.test"], { probe, logger });

    expect(code).toBe(0);
    expect(probe).toHaveBeenCalledTimes(3);
    expect(output).toBe(
      [
        "Average request time: 1s",
        "DNS Lookup: 0.2s",
        "TCP Connection: 0.2s",
        "Connection Acquisition: 0s",
        "Server Processing: 0.2s",
        "Content Transfer: 0.4s",
        "",
      ].join("\n")
    );
  });

  it("takes a sample target with -n", async () => {
    const probe = jest.fn<ProbeFn>(async () => measurement);

    await main(["-c", "2", "-n", "7", "bench.test"], { probe, logger });

    expect(probe).toHaveBeenCalledTimes(7);
  });

  it("prints usage and exits 1 without a url", async () => {
    expect(await main([], { logger })).toBe(1);
    expect(output.startsWith("Usage: http-phase-bench [OPTIONS] url")).toBe(true);
  });

  it("exits 0 for --help", async () => {
    expect(await main(["--help"], { logger })).toBe(0);
  });

  it("exits 1 on invalid input before probing", async () => {
    const probe = jest.fn<ProbeFn>(async () => measurement);
    const error = jest.spyOn(logger, "error");

    expect(await main(["-c", "0", "bench.test"], { probe, logger })).toBe(1);
    expect(probe).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("concurrency must be a positive integer, got 0");
  });

  it("exits 2 with the failing stage when a probe fails", async () => {
    const error = jest.spyOn(logger, "error");

    expect(await main(["-c", "2", "bench.test"], { probe: unresolvable, logger })).toBe(2);
    expect(error).toHaveBeenCalledWith("dns failed for http://bench.test/: getaddrinfo ENOTFOUND bench.test");
  });

  it("reports succeeded and failed counts when every probe failed", async () => {
    const error = jest.spyOn(logger, "error");

    expect(await main(["-c", "3", "--collect-errors", "bench.test"], { probe: unresolvable, logger })).toBe(2);
    expect(error).toHaveBeenCalledWith(
      "All probes failed: 0 of 3 requested samples succeeded, 3 failed " +
        "(first failure: dns failed for http://bench.test/: getaddrinfo ENOTFOUND bench.test)"
    );
  });
});
