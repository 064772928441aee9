export type ClusterErrorKind =
  | "Unreachable"
  | "UpstreamError"
  | "NodeNotFound"
  | "PodNotFound"
  | "NoHealthyNodes";

/**
 * Base class for failures raised by node clients and the aggregator.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export abstract class ClusterError extends Error {
  abstract readonly kind: ClusterErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Transport failure or timeout talking to a node agent
 */
export class UnreachableError extends ClusterError {
  readonly kind = "Unreachable" as const;

  constructor(
    public readonly node: string,
    reason: string,
  ) {
    super(`node ${node} is unreachable: ${reason}`);
  }
}

/**
 * The agent answered, but with a status >= 400 or an unusable body
 */
export class UpstreamError extends ClusterError {
  readonly kind = "UpstreamError" as const;

  constructor(
    public readonly node: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`node ${node} returned ${status}: ${body}`);
  }
}

export class NodeNotFoundError extends ClusterError {
  readonly kind = "NodeNotFound" as const;

  constructor(public readonly node: string) {
    super(`node "${node}" not found`);
  }
}

export class PodNotFoundError extends ClusterError {
  readonly kind = "PodNotFound" as const;

  constructor(
    public readonly namespace: string,
    public readonly pod: string,
  ) {
    super(`pod ${namespace}/${pod} not found on any node`);
  }
}

export class NoHealthyNodesError extends ClusterError {
  readonly kind = "NoHealthyNodes" as const;

  constructor() {
    super("no healthy nodes available");
  }
}

/**
 * Invalid static configuration; fatal at startup
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Extract a human-readable message from an unknown thrown value. */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return err.message;
  }
  return String(err);
}

export function isNotFoundError(
  err: unknown,
): err is NodeNotFoundError | PodNotFoundError {
  return err instanceof NodeNotFoundError || err instanceof PodNotFoundError;
}
