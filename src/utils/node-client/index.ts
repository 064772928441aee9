import type { Response } from "node-fetch";
import type { NodeLiveness } from "../../models/types.js";
import { ConfigError, UnreachableError } from "../errors.js";
import type { NodeClientContext, NodeClientOptions } from "./node-client-types.js";
import { nodeOperations } from "./node-operations.js";
import { podOperations } from "./pod-operations.js";
import { send } from "./transport.js";

export const DEFAULT_NODE_TIMEOUT_MS = 10_000;

/**
 * Proxy to one node agent's REST API, plus the liveness the health checker
 * keeps for it. Every call is a single attempt; callers decide what a
 * failure means.
 */
export class NodeClient implements NodeClientContext {
  public readonly name: string;
  public readonly address: string;
  public readonly timeoutMs: number;

  // Only ping() writes this
  private liveness: NodeLiveness = { healthy: true, lastPing: null };

  // Mix in the operations
  public listPods: typeof podOperations.listPods;
  public getPod: typeof podOperations.getPod;
  public createPod: typeof podOperations.createPod;
  public deletePod: typeof podOperations.deletePod;
  public getPodLog: typeof podOperations.getPodLog;
  public getContainerLog: typeof podOperations.getContainerLog;
  public watchPods: typeof podOperations.watchPods;

  public getNode: typeof nodeOperations.getNode;

  constructor(name: string, address: string, options: NodeClientOptions = {}) {
    if (!name.trim()) {
      throw new ConfigError("node name must not be empty");
    }

    let url: URL;
    try {
      url = new URL(address);
    } catch {
      throw new ConfigError(`node ${name}: invalid address "${address}"`);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ConfigError(
        `node ${name}: address must be http or https, got "${address}"`,
      );
    }

    this.name = name;
    this.address = address.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_NODE_TIMEOUT_MS;

    this.listPods = podOperations.listPods.bind(this);
    this.getPod = podOperations.getPod.bind(this);
    this.createPod = podOperations.createPod.bind(this);
    this.deletePod = podOperations.deletePod.bind(this);
    this.getPodLog = podOperations.getPodLog.bind(this);
    this.getContainerLog = podOperations.getContainerLog.bind(this);
    this.watchPods = podOperations.watchPods.bind(this);

    this.getNode = nodeOperations.getNode.bind(this);
  }

  /**
   * Probe /healthz and record the outcome. Any non-2xx answer or transport
   * failure marks the node unhealthy and rejects with UnreachableError.
   */
  async ping(): Promise<void> {
    let response: Response;
    try {
      response = await send(this, "GET", "/healthz");
    } catch (error) {
      this.liveness = { ...this.liveness, healthy: false };
      throw error;
    }

    if (!response.ok) {
      this.liveness = { ...this.liveness, healthy: false };
      throw new UnreachableError(
        this.name,
        `health check returned ${response.status}`,
      );
    }

    this.liveness = { healthy: true, lastPing: new Date() };
  }

  isHealthy(): boolean {
    return this.liveness.healthy;
  }

  /**
   * Time of the last successful ping, or null if none succeeded yet
   */
  lastPing(): Date | null {
    return this.liveness.lastPing;
  }
}
