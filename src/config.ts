import type { NodeDef } from "./models/types.js";
import { ConfigError } from "./utils/errors.js";
import { DEFAULT_NODE_TIMEOUT_MS } from "./utils/node-client/index.js";
import { DEFAULT_HEALTH_INTERVAL_MS } from "./services/health-checker.js";

export interface ConsoleConfig {
  clusterName: string;
  httpPort: number;
  nodeTimeoutMs: number;
  healthIntervalMs: number;
  nodes: NodeDef[];
}

/**
 * Parse "alpha=http://10.0.0.2:8082,beta=http://10.0.0.3:8082" into node
 * definitions, keeping their order
 */
export function parseNodeList(raw: string): NodeDef[] {
  const nodes: NodeDef[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf("=");
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new ConfigError(
        `invalid node entry "${trimmed}", expected name=address`,
      );
    }

    const name = trimmed.slice(0, separator).trim();
    const address = trimmed.slice(separator + 1).trim();
    if (seen.has(name)) {
      throw new ConfigError(`duplicate node name "${name}"`);
    }
    seen.add(name);
    nodes.push({ name, address });
  }

  return nodes;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the static configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConsoleConfig {
  const clusterName = env.CLUSTER_NAME || "cluster";
  let nodes = parseNodeList(env.CONSOLE_NODES || "");

  // A lone agent can be given by URL; it takes the cluster's name
  if (nodes.length === 0 && env.AGENT_URL) {
    nodes = [{ name: clusterName, address: env.AGENT_URL }];
  }

  if (nodes.length === 0) {
    throw new ConfigError(
      "at least one node must be configured (CONSOLE_NODES or AGENT_URL)",
    );
  }

  const httpPort = parsePositiveInt(env, "HTTP_PORT", 9090);
  if (httpPort > 65535) {
    throw new ConfigError(`HTTP_PORT out of range: ${httpPort}`);
  }

  return {
    clusterName,
    httpPort,
    nodeTimeoutMs: parsePositiveInt(
      env,
      "NODE_TIMEOUT_MS",
      DEFAULT_NODE_TIMEOUT_MS,
    ),
    healthIntervalMs:
      parsePositiveInt(
        env,
        "HEALTH_INTERVAL_SECONDS",
        DEFAULT_HEALTH_INTERVAL_MS / 1000,
      ) * 1000,
    nodes,
  };
}
