import type { Node, Pod, PodLocation, ClusterSummary } from "../../models/types.js";
import { ConfigError, NodeNotFoundError } from "../../utils/errors.js";
import { NodeClient } from "../../utils/node-client/index.js";
import type { AggregatorContext } from "./aggregator-types.js";
import { listAllNodes, listAllPods, pingAll } from "./fan-out.js";
import {
  deletePod,
  getContainerLog,
  getPod,
  getPodLog,
} from "./pod-routing.js";
import { createPod } from "./scheduling.js";
import { getClusterSummary } from "./summary.js";

/**
 * Single cluster view over a fixed set of node clients. Holds no pod or
 * node state; every read goes back to the agents.
 *
 * The registry is only ever copied out synchronously, so no await runs
 * while it is being read.
 */
export class Aggregator implements AggregatorContext {
  private readonly clients = new Map<string, NodeClient>();

  constructor(clients: NodeClient[]) {
    for (const client of clients) {
      if (this.clients.has(client.name)) {
        throw new ConfigError(`duplicate node name "${client.name}"`);
      }
      this.clients.set(client.name, client);
    }
  }

  snapshot(): NodeClient[] {
    return [...this.clients.values()];
  }

  requireClient(name: string): NodeClient {
    const client = this.clients.get(name);
    if (!client) {
      throw new NodeNotFoundError(name);
    }
    return client;
  }

  isHealthy(name: string): boolean {
    return this.requireClient(name).isHealthy();
  }

  // Fan-out
  async listAllPods(): Promise<Pod[]> {
    return listAllPods.call(this);
  }

  async listNamespacedPods(namespace: string): Promise<Pod[]> {
    const pods = await this.listAllPods();
    return pods.filter((pod) => pod.metadata?.namespace === namespace);
  }

  async listAllNodes(): Promise<Node[]> {
    return listAllNodes.call(this);
  }

  async pingAll(): Promise<void> {
    return pingAll.call(this);
  }

  // Pod routing
  async getPod(namespace: string, name: string): Promise<PodLocation> {
    return getPod.call(this, namespace, name);
  }

  async createPod(pod: Pod): Promise<Pod> {
    return createPod.call(this, pod);
  }

  async deletePod(namespace: string, name: string): Promise<void> {
    return deletePod.call(this, namespace, name);
  }

  async getPodLog(namespace: string, name: string): Promise<string> {
    return getPodLog.call(this, namespace, name);
  }

  async getContainerLog(
    namespace: string,
    pod: string,
    container: string,
  ): Promise<string> {
    return getContainerLog.call(this, namespace, pod, container);
  }

  // Nodes
  async getNode(name: string): Promise<Node> {
    return this.requireClient(name).getNode();
  }

  async getClusterSummary(): Promise<ClusterSummary> {
    return getClusterSummary.call(this);
  }
}
