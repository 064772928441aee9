import { Readable } from "node:stream";
import type { Aggregator } from "../controllers/aggregator/index.js";
import type { PodEvent } from "../models/types.js";
import { getErrorMessage } from "../utils/errors.js";
import logger from "../utils/logger.js";
import type { NodeClient } from "../utils/node-client/index.js";
import { delay, waitForAbort } from "../utils/timers.js";

export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_WATCH_WINDOW_MS = 1_000;

export interface EventStreamerOptions {
  /** Time between full pod-list polls */
  pollIntervalMs?: number;
  /** How long to collect already-buffered lines from a watch */
  watchWindowMs?: number;
}

function splitLines(text: string, includeTail: boolean): string[] {
  const parts = text.split("\n");
  // Without a clean end of stream the last piece may be half a record
  const tail = parts.pop() ?? "";
  if (includeTail) {
    parts.push(tail);
  }
  return parts.map((line) => line.trim()).filter((line) => line.length > 0);
}

function onLateError(error: unknown) {
  logger.debug(`watch stream closed: ${getErrorMessage(error)}`);
}

/**
 * Collect the lines a watch body has ready: read until the body ends, the
 * window closes or `signal` aborts. The listeners are detached afterwards,
 * except for an error sink so a late abort on the body is not left
 * unhandled.
 */
export function readBufferedLines(
  body: NodeJS.ReadableStream | null,
  windowMs: number,
  signal: AbortSignal,
): Promise<string[]> {
  if (!body) {
    return Promise.resolve([]);
  }
  const stream = body;
  if (signal.aborted) {
    stream.on("error", onLateError);
    return Promise.resolve([]);
  }

  return new Promise((resolve) => {
    let buffered = "";
    let settled = false;

    const onData = (chunk: string | Buffer) => {
      buffered += chunk.toString();
    };
    const finish = (ended: boolean) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      stream.removeListener("data", onData);
      stream.removeListener("end", onEnd);
      stream.removeListener("error", onError);
      stream.on("error", onLateError);
      resolve(splitLines(buffered, ended));
    };
    const onEnd = () => finish(true);
    const onError = (error: unknown) => {
      logger.warn(`watch stream failed: ${getErrorMessage(error)}`);
      finish(false);
    };
    const onAbort = () => finish(false);

    const timer = setTimeout(() => finish(false), windowMs);
    signal.addEventListener("abort", onAbort, { once: true });
    stream.setEncoding("utf8");
    stream.on("data", onData);
    stream.on("end", onEnd);
    stream.on("error", onError);
  });
}

/**
 * Builds per-observer pod event sessions: replay whatever the nodes' watch
 * endpoints have buffered, then poll the full pod list forever.
 */
export class EventStreamer {
  private readonly aggregator: Aggregator;
  private readonly pollIntervalMs: number;
  private readonly watchWindowMs: number;

  constructor(aggregator: Aggregator, options: EventStreamerOptions = {}) {
    this.aggregator = aggregator;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.watchWindowMs = options.watchWindowMs ?? DEFAULT_WATCH_WINDOW_MS;
  }

  /**
   * One observer's event feed. Pull-driven and unbounded: it ends only when
   * `signal` aborts or the consumer stops iterating.
   */
  async *session(signal: AbortSignal): AsyncGenerator<PodEvent, void, void> {
    const clients = this.aggregator.snapshot();
    if (clients.length === 0) {
      // Nothing to report; the transport's keep-alives hold the stream open
      await waitForAbort(signal);
      return;
    }

    const batches = await Promise.all(
      clients.map((client) => this.replayWatch(client, signal)),
    );
    for (const line of batches.flat()) {
      if (signal.aborted) return;
      yield { event: "pod-update", data: line };
    }

    while (await delay(this.pollIntervalMs, signal)) {
      const pods = await this.aggregator.listAllPods();
      if (signal.aborted) return;
      yield { event: "pod-list", data: JSON.stringify(pods) };
    }
  }

  private async replayWatch(
    client: NodeClient,
    signal: AbortSignal,
  ): Promise<string[]> {
    const connection = new AbortController();
    try {
      const response = await client.watchPods(
        AbortSignal.any([connection.signal, signal]),
      );
      const lines = await readBufferedLines(
        response.body,
        this.watchWindowMs,
        signal,
      );
      if (response.body instanceof Readable) {
        response.body.destroy();
      }
      return lines;
    } catch (error) {
      if (!signal.aborted) {
        logger.warn(
          `watch not available on ${client.name}: ${getErrorMessage(error)}`,
        );
      }
      return [];
    } finally {
      connection.abort();
    }
  }
}
