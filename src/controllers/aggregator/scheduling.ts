import { stampOwner } from "../../models/guards.js";
import type { Pod } from "../../models/types.js";
import { NoHealthyNodesError, getErrorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import type { NodeClient } from "../../utils/node-client/index.js";
import type { AggregatorContext } from "./aggregator-types.js";

/**
 * Pick the healthy node currently running the fewest pods. Unhealthy nodes
 * are skipped whatever their load, as are nodes that fail the count query.
 * Ties go to the node listed first.
 */
export async function selectLeastLoaded(
  clients: NodeClient[],
): Promise<NodeClient> {
  const healthy = clients.filter((client) => client.isHealthy());

  const counts = await Promise.all(
    healthy.map(async (client) => {
      try {
        return (await client.listPods()).items.length;
      } catch (error) {
        logger.warn(
          `skipping ${client.name} for scheduling: ${getErrorMessage(error)}`,
        );
        return null;
      }
    }),
  );

  let target: NodeClient | null = null;
  let minPods = Number.POSITIVE_INFINITY;
  for (let i = 0; i < healthy.length; i++) {
    const count = counts[i];
    if (count !== null && count < minPods) {
      minPods = count;
      target = healthy[i];
    }
  }

  if (!target) {
    throw new NoHealthyNodesError();
  }
  return target;
}

/**
 * Place a pod: on spec.nodeName when given, otherwise by least-pods
 */
export async function createPod(
  this: AggregatorContext,
  pod: Pod,
): Promise<Pod> {
  const nodeName = pod.spec?.nodeName;
  const target = nodeName
    ? this.requireClient(nodeName)
    : await selectLeastLoaded(this.snapshot());

  const namespace = pod.metadata?.namespace || "default";
  logger.info(
    `Creating pod ${namespace}/${pod.metadata?.name ?? ""} on ${target.name}`,
  );
  const created = await target.createPod(pod);
  return stampOwner(created, target.name);
}
