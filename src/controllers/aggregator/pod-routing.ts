import { stampOwner } from "../../models/guards.js";
import type { PodLocation } from "../../models/types.js";
import { PodNotFoundError, getErrorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import type { Aggregator } from "./index.js";

/**
 * Find the node that owns a pod by asking each node in turn, stopping at
 * the first hit
 */
export async function getPod(
  this: Aggregator,
  namespace: string,
  name: string,
): Promise<PodLocation> {
  for (const client of this.snapshot()) {
    try {
      const pod = await client.getPod(namespace, name);
      return { pod: stampOwner(pod, client.name), nodeName: client.name };
    } catch (error) {
      logger.debug(
        `pod ${namespace}/${name} not served by ${client.name}: ${getErrorMessage(error)}`,
      );
    }
  }
  throw new PodNotFoundError(namespace, name);
}

/**
 * Resolve the owner, then delete on that node only
 */
export async function deletePod(
  this: Aggregator,
  namespace: string,
  name: string,
): Promise<void> {
  const { nodeName } = await this.getPod(namespace, name);
  logger.info(`Deleting pod ${namespace}/${name} on ${nodeName}`);
  await this.requireClient(nodeName).deletePod(namespace, name);
}

export async function getPodLog(
  this: Aggregator,
  namespace: string,
  name: string,
): Promise<string> {
  const { nodeName } = await this.getPod(namespace, name);
  return this.requireClient(nodeName).getPodLog(namespace, name);
}

export async function getContainerLog(
  this: Aggregator,
  namespace: string,
  pod: string,
  container: string,
): Promise<string> {
  const { nodeName } = await this.getPod(namespace, pod);
  return this.requireClient(nodeName).getContainerLog(
    namespace,
    pod,
    container,
  );
}
