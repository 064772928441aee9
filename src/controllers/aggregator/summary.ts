import type { ClusterSummary, Pod } from "../../models/types.js";
import { getErrorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import type { AggregatorContext } from "./aggregator-types.js";

/**
 * Build the cluster overview node by node. A node whose pods cannot be
 * listed counts as running none; the summary itself always completes.
 */
export async function getClusterSummary(
  this: AggregatorContext,
): Promise<ClusterSummary> {
  const clients = this.snapshot();
  const summary: ClusterSummary = {
    nodeCount: clients.length,
    healthyNodes: 0,
    podCount: 0,
    runningPods: 0,
    nodes: [],
  };

  for (const client of clients) {
    const healthy = client.isHealthy();
    if (healthy) {
      summary.healthyNodes++;
    }

    let pods: Pod[] = [];
    try {
      pods = (await client.listPods()).items;
    } catch (error) {
      logger.warn(
        `summary: error listing pods from ${client.name}: ${getErrorMessage(error)}`,
      );
    }

    summary.podCount += pods.length;
    summary.runningPods += pods.filter(
      (pod) => pod.status?.phase === "Running",
    ).length;
    summary.nodes.push({
      name: client.name,
      healthy,
      podCount: pods.length,
      lastPing: client.lastPing(),
    });
  }

  return summary;
}
