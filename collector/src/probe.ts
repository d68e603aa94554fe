import dns from "node:dns";
import http from "node:http";
import https from "node:https";
import net from "node:net";
import type { LookupFunction } from "node:net";
import { toNetworkFailure } from "./errors";
import type { Checkpoints, Clock, PhaseMeasurement, ProbeOptions, ProbeStage } from "./types";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

const systemClock: Clock = () => process.hrtime.bigint();

const systemLookup: LookupFunction = (hostname, options, callback) => {
  dns.lookup(hostname, options, callback);
};

function notBefore(value: bigint, floor: bigint): bigint {
  return value < floor ? floor : value;
}

/**
 * Turns raw lifecycle checkpoints into phase durations.
 *
 * Missing checkpoints collapse onto their neighbour: no DNS means
 * dnsStart == dnsDone == connectStart, no first byte means firstByte == done.
 * Each checkpoint is then clamped to its predecessor, so every phase is
 * non-negative and the phases always add up to `total`.
 */
export function derivePhases(checkpoints: Checkpoints): PhaseMeasurement {
  const { done } = checkpoints;
  const dnsFallback =
    checkpoints.dnsDone ??
    checkpoints.connectStart ??
    checkpoints.connDone ??
    checkpoints.gotConn ??
    checkpoints.firstByte ??
    done;

  const dnsStart = checkpoints.dnsStart ?? dnsFallback;
  const dnsDone = notBefore(dnsFallback, dnsStart);
  const connDone = notBefore(checkpoints.connDone ?? dnsDone, dnsDone);
  const gotConn = notBefore(checkpoints.gotConn ?? connDone, connDone);
  const firstByte = notBefore(checkpoints.firstByte ?? done, gotConn);
  const end = notBefore(done, firstByte);

  return {
    dnsLookup: dnsDone - dnsStart,
    tcpConnection: connDone - dnsDone,
    connectionAcquisition: gotConn - connDone,
    serverProcessing: firstByte - gotConn,
    contentTransfer: end - firstByte,
    total: end - dnsStart,
  };
}

function isLiteralAddress(hostname: string): boolean {
  return net.isIP(hostname.replace(/^\[|\]$/g, "")) !== 0;
}

/**
 * Issues one GET against `url` and times each phase of it.
 * Rejects with a NetworkFailureError tagged with the stage that failed.
 */
export function probe(url: string, options: ProbeOptions = {}): Promise<PhaseMeasurement> {
  const clock = options.clock ?? systemClock;
  const resolver = options.lookup ?? systemLookup;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;

  const target = new URL(url);
  const isTls = target.protocol === "https:";
  const checkpoints: Omit<Checkpoints, "done"> = {};
  let stage: ProbeStage = isLiteralAddress(target.hostname) ? "connect" : "dns";

  return new Promise<PhaseMeasurement>((resolve, reject) => {
    let settled = false;
    let handshakeTimer: NodeJS.Timeout | undefined;

    const fail = (error: unknown) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(handshakeTimer);
      req.destroy();
      reject(toNetworkFailure(error, stage, url));
    };

    const lookup: LookupFunction = (hostname, lookupOptions, callback) => {
      checkpoints.dnsStart = clock();
      resolver(hostname, lookupOptions, (err, address, family) => {
        checkpoints.dnsDone = clock();
        if (!err) {
          stage = "connect";
        }
        callback(err, address, family);
      });
    };

    const onResponse = (res: http.IncomingMessage) => {
      checkpoints.firstByte = clock();
      stage = "transfer";

      res.on("error", fail);
      res.once("end", () => {
        if (settled) {
          return;
        }
        settled = true;
        resolve(derivePhases({ ...checkpoints, done: clock() }));
      });
      res.once("close", () => {
        if (!res.complete) {
          fail(new Error("Response closed before the body was fully read"));
        }
      });
      res.resume();
    };

    const requestOptions: http.RequestOptions = {
      method: "GET",
      agent: options.agent ?? false,
      lookup,
      headers: options.headers,
      signal: options.signal,
    };

    checkpoints.connectStart = clock();
    const req = isTls
      ? https.request(target, requestOptions, onResponse)
      : http.request(target, requestOptions, onResponse);

    req.once("socket", (socket: net.Socket) => {
      // Pooled connection, nothing left to establish
      if (!socket.connecting) {
        checkpoints.gotConn = clock();
        stage = "request";
        return;
      }

      socket.once("connect", () => {
        checkpoints.connDone = clock();
        if (!isTls) {
          checkpoints.gotConn = checkpoints.connDone;
          stage = "request";
          return;
        }
        stage = "tls";
        handshakeTimer = setTimeout(() => {
          fail(new Error(`TLS handshake timed out after ${handshakeTimeoutMs}ms`));
        }, handshakeTimeoutMs);
      });

      if (isTls) {
        socket.once("secureConnect", () => {
          clearTimeout(handshakeTimer);
          checkpoints.gotConn = clock();
          stage = "request";
        });
      }
    });

    req.setTimeout(timeoutMs, () => {
      fail(new Error(`Socket idle for more than ${timeoutMs}ms`));
    });
    req.on("error", fail);
    req.end();
  });
}
