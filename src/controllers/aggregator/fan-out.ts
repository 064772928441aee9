import { stampOwner } from "../../models/guards.js";
import type { Node, Pod } from "../../models/types.js";
import { getErrorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import type { AggregatorContext } from "./aggregator-types.js";

/**
 * Ask every node for its pods at once and merge what comes back.
 * A failing node is logged and left out; this never rejects.
 */
export async function listAllPods(this: AggregatorContext): Promise<Pod[]> {
  const batches = await Promise.all(
    this.snapshot().map(async (client) => {
      try {
        const list = await client.listPods();
        return list.items.map((pod) => stampOwner(pod, client.name));
      } catch (error) {
        logger.warn(
          `error listing pods from ${client.name}: ${getErrorMessage(error)}`,
        );
        return [];
      }
    }),
  );
  return batches.flat();
}

/**
 * Same fan-out as listAllPods, over the Node objects
 */
export async function listAllNodes(this: AggregatorContext): Promise<Node[]> {
  const nodes = await Promise.all(
    this.snapshot().map(async (client) => {
      try {
        return [await client.getNode()];
      } catch (error) {
        logger.warn(
          `error getting node from ${client.name}: ${getErrorMessage(error)}`,
        );
        return [];
      }
    }),
  );
  return nodes.flat();
}

/**
 * Ping every node concurrently. Only liveness changes; failures are logged.
 */
export async function pingAll(this: AggregatorContext): Promise<void> {
  await Promise.all(
    this.snapshot().map(async (client) => {
      try {
        await client.ping();
      } catch (error) {
        logger.warn(
          `health check failed for ${client.name}: ${getErrorMessage(error)}`,
        );
      }
    }),
  );
}
