import type * as k8s from "@kubernetes/client-node";

// Kubernetes object model, as spoken by the node agents and our own API
export type Pod = k8s.V1Pod;
export type PodList = k8s.V1PodList;
export type Node = k8s.V1Node;
export type NodeList = k8s.V1NodeList;
export type Status = k8s.V1Status;
export type APIVersions = k8s.V1APIVersions;
export type APIResourceList = k8s.V1APIResourceList;

// Annotation recording which node agent a pod came from
export const NODE_ANNOTATION = "cluster-console.io/node";

// Static definition of one node agent
export interface NodeDef {
  name: string;
  address: string;
}

// Liveness tracked per node client
export interface NodeLiveness {
  healthy: boolean;
  lastPing: Date | null;
}

// Result of resolving a pod to the node that owns it
export interface PodLocation {
  pod: Pod;
  nodeName: string;
}

// Per-node line of the cluster summary
export interface NodeSummary {
  name: string;
  healthy: boolean;
  podCount: number;
  lastPing: Date | null;
}

// Cluster-wide overview, recomputed on every request
export interface ClusterSummary {
  nodeCount: number;
  healthyNodes: number;
  podCount: number;
  runningPods: number;
  nodes: NodeSummary[];
}

// Discrete event produced by an event streamer session
export interface PodEvent {
  event: "pod-update" | "pod-list";
  data: string;
}
