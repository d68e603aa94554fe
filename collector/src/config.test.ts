import { describe, expect, it } from "@jest/globals";
import { createConfig, normalizeUrl } from "./config";
import { InvalidInputError } from "./errors";

describe("normalizeUrl", () => {
  it("defaults to http when no scheme is given", () => {
    expect(normalizeUrl("example.com")).toBe("http://example.com/");
    expect(normalizeUrl("  localhost:8080/health ")).toBe("http://localhost:8080/health");
  });

  it("keeps explicit http and https urls", () => {
    expect(normalizeUrl("https://example.com/path?q=1")).toBe("https://example.com/path?q=1");
    expect(normalizeUrl("HTTP://example.com")).toBe("http://example.com/");
  });

  it("rejects empty, malformed and non-http urls", () => {
    expect(() => normalizeUrl("")).toThrow("No URL provided");
    expect(() => normalizeUrl("   ")).toThrow(InvalidInputError);
    expect(() => normalizeUrl("http://exa mple.com")).toThrow("Invalid URL: http://exa mple.com");
    expect(() => normalizeUrl("ftp://example.com")).toThrow("Unsupported protocol ftp: (only http and https)");
  });
});

describe("createConfig", () => {
  it("fills in defaults", () => {
    expect(createConfig({ url: "example.com", concurrency: 4 })).toEqual({
      url: "http://example.com/",
      concurrency: 4,
      totalSamples: undefined,
      errorPolicy: "failFast",
      probe: {},
    });
  });

  it("keeps the sample target, error policy and probe options", () => {
    const config = createConfig({
      url: "https://example.com",
      concurrency: 2,
      totalSamples: 50,
      errorPolicy: "collectErrors",
      probe: { timeoutMs: 1000 },
    });

    expect(config.totalSamples).toBe(50);
    expect(config.errorPolicy).toBe("collectErrors");
    expect(config.probe).toEqual({ timeoutMs: 1000 });
  });

  it("rejects a missing or non-positive concurrency", () => {
    expect(() => createConfig({ url: "example.com" })).toThrow("Number of connections is required");
    expect(() => createConfig({ url: "example.com", concurrency: 0 })).toThrow(
      "concurrency must be a positive integer, got 0"
    );
    expect(() => createConfig({ url: "example.com", concurrency: -3 })).toThrow(InvalidInputError);
    expect(() => createConfig({ url: "example.com", concurrency: 1.5 })).toThrow(InvalidInputError);
  });

  it("rejects invalid sample targets and timeouts", () => {
    expect(() => createConfig({ url: "example.com", concurrency: 1, totalSamples: 0 })).toThrow(
      "totalSamples must be a positive integer, got 0"
    );
    expect(() => createConfig({ url: "example.com", concurrency: 1, probe: { timeoutMs: Number.NaN } })).toThrow(
      "timeoutMs must be a positive integer, got NaN"
    );
  });

  it("rejects a missing url before looking at anything else", () => {
    expect(() => createConfig({ concurrency: 0 })).toThrow("No URL provided");
  });
});
