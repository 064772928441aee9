import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Aggregator } from "../src/controllers/aggregator/index.js";
import { HealthChecker } from "../src/services/health-checker.js";
import { NodeClient } from "../src/utils/node-client/index.js";
import { delay } from "../src/utils/timers.js";
import { FakeNodeAgent } from "./helpers/fake-node-agent.js";

describe("HealthChecker", () => {
  describe("loop timing", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("pings once on start, then on every interval", async () => {
      const aggregator = new Aggregator([]);
      const ping = vi.spyOn(aggregator, "pingAll").mockResolvedValue();
      const checker = new HealthChecker(aggregator);

      await checker.start();
      expect(ping).toHaveBeenCalledTimes(1);
      expect(checker.isRunning()).toBe(true);

      await vi.advanceTimersByTimeAsync(14_999);
      expect(ping).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(ping).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(15_000);
      expect(ping).toHaveBeenCalledTimes(3);

      await checker.stop();
    });

    it("honours a custom interval", async () => {
      const aggregator = new Aggregator([]);
      const ping = vi.spyOn(aggregator, "pingAll").mockResolvedValue();
      const checker = new HealthChecker(aggregator, { intervalMs: 2_000 });

      await checker.start();
      await vi.advanceTimersByTimeAsync(6_000);
      expect(ping).toHaveBeenCalledTimes(4);

      await checker.stop();
    });

    it("never pings after stop resolves", async () => {
      const aggregator = new Aggregator([]);
      const ping = vi.spyOn(aggregator, "pingAll").mockResolvedValue();
      const checker = new HealthChecker(aggregator);

      await checker.start();
      await checker.stop();
      expect(checker.isRunning()).toBe(false);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(ping).toHaveBeenCalledTimes(1);
    });

    it("lets a round in flight finish before stopping", async () => {
      const aggregator = new Aggregator([]);
      let release = () => {};
      const ping = vi
        .spyOn(aggregator, "pingAll")
        .mockResolvedValueOnce()
        .mockImplementationOnce(
          () =>
            new Promise<void>((resolve) => {
              release = () => resolve();
            }),
        );
      const checker = new HealthChecker(aggregator);

      await checker.start();
      await vi.advanceTimersByTimeAsync(15_000);
      expect(ping).toHaveBeenCalledTimes(2);

      let stopped = false;
      const stopping = checker.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(0);
      expect(stopped).toBe(false);

      release();
      await stopping;
      expect(stopped).toBe(true);
      expect(ping).toHaveBeenCalledTimes(2);
    });

    it("stays stopped when stop runs during the first round", async () => {
      const aggregator = new Aggregator([]);
      let release = () => {};
      const ping = vi.spyOn(aggregator, "pingAll").mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = () => resolve();
          }),
      );
      const checker = new HealthChecker(aggregator);

      const starting = checker.start();
      await checker.stop();
      release();
      await starting;

      expect(checker.isRunning()).toBe(false);
      await vi.advanceTimersByTimeAsync(60_000);
      expect(ping).toHaveBeenCalledTimes(1);
    });

    it("ignores a second start", async () => {
      const aggregator = new Aggregator([]);
      const ping = vi.spyOn(aggregator, "pingAll").mockResolvedValue();
      const checker = new HealthChecker(aggregator);

      await checker.start();
      await checker.start();
      expect(ping).toHaveBeenCalledTimes(1);

      await checker.stop();
    });
  });

  describe("against agents", () => {
    const agents: FakeNodeAgent[] = [];

    afterEach(async () => {
      await Promise.all(agents.splice(0).map((agent) => agent.stop()));
    });

    it("marks failing nodes unhealthy after the first round", async () => {
      const up = new FakeNodeAgent("up");
      const sick = new FakeNodeAgent("sick", { healthStatus: 500 });
      agents.push(up, sick);
      const aggregator = new Aggregator([
        new NodeClient("up", await up.start()),
        new NodeClient("sick", await sick.start()),
      ]);
      const checker = new HealthChecker(aggregator, { intervalMs: 60_000 });

      await checker.start();

      expect(aggregator.isHealthy("up")).toBe(true);
      expect(aggregator.isHealthy("sick")).toBe(false);
      await checker.stop();
    });
  });
});

describe("delay", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves true once the time has passed", async () => {
    const waited = delay(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    await expect(waited).resolves.toBe(true);
  });

  it("resolves false when aborted early", async () => {
    const controller = new AbortController();
    const waited = delay(1_000, controller.signal);
    controller.abort();
    await expect(waited).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("resolves false at once for an aborted signal", async () => {
    await expect(delay(1_000, AbortSignal.abort())).resolves.toBe(false);
  });
});
