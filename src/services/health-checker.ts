import type { Aggregator } from "../controllers/aggregator/index.js";
import logger from "../utils/logger.js";
import { delay } from "../utils/timers.js";

export const DEFAULT_HEALTH_INTERVAL_MS = 15_000;

export interface HealthCheckerOptions {
  intervalMs?: number;
}

/**
 * Background liveness loop over every node client. Runs beside request
 * handling and only ever touches node liveness.
 */
export class HealthChecker {
  private readonly aggregator: Aggregator;
  private readonly intervalMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(aggregator: Aggregator, options: HealthCheckerOptions = {}) {
    this.aggregator = aggregator;
    this.intervalMs = options.intervalMs ?? DEFAULT_HEALTH_INTERVAL_MS;
  }

  /**
   * Ping every node once, then keep pinging on the interval in the
   * background. Resolves after the first round.
   */
  async start() {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    await this.aggregator.pingAll();
    // stop() may have run during the first round
    if (controller.signal.aborted) {
      return;
    }
    this.loop = this.run(controller.signal);
    logger.info(
      `Started health checker with interval ${this.intervalMs / 1000}s`,
    );
  }

  /**
   * Signal shutdown and wait for the loop to exit. A round already in
   * flight completes first.
   */
  async stop() {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    logger.info("Health checker stopped");
  }

  isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  private async run(signal: AbortSignal) {
    while (await delay(this.intervalMs, signal)) {
      await this.aggregator.pingAll();
    }
  }
}
