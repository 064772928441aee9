import { NODE_ANNOTATION, type Node, type Pod, type PodList } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasOptionalRecord(value: Record<string, unknown>, key: string) {
  return value[key] === undefined || isRecord(value[key]);
}

/**
 * Structural check for a Pod coming off the wire
 */
export function isPod(value: unknown): value is Pod {
  return (
    isRecord(value) &&
    hasOptionalRecord(value, "metadata") &&
    hasOptionalRecord(value, "spec") &&
    hasOptionalRecord(value, "status")
  );
}

export function isPodList(value: unknown): value is PodList {
  return (
    isRecord(value) && Array.isArray(value.items) && value.items.every(isPod)
  );
}

export function isNode(value: unknown): value is Node {
  return (
    isRecord(value) &&
    hasOptionalRecord(value, "metadata") &&
    hasOptionalRecord(value, "status")
  );
}

/**
 * Copy a pod with the owning-node annotation set. The input is left untouched.
 */
export function stampOwner(pod: Pod, nodeName: string): Pod {
  return {
    ...pod,
    metadata: {
      ...pod.metadata,
      annotations: {
        ...pod.metadata?.annotations,
        [NODE_ANNOTATION]: nodeName,
      },
    },
  };
}
