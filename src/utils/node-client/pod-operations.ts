import type { Response } from "node-fetch";
import { isPod, isPodList } from "../../models/guards.js";
import type { Pod, PodList } from "../../models/types.js";
import type { NodeClientContext } from "./node-client-types.js";
import { readText, request, requestJson } from "./transport.js";

function podsPath(namespace: string): string {
  return `/api/v1/namespaces/${encodeURIComponent(namespace)}/pods`;
}

function podPath(namespace: string, name: string): string {
  return `${podsPath(namespace)}/${encodeURIComponent(name)}`;
}

export const podOperations = {
  /**
   * List every pod the agent runs, across namespaces
   */
  async listPods(this: NodeClientContext): Promise<PodList> {
    return requestJson(this, "GET", "/api/v1/pods", isPodList);
  },

  /**
   * Get a Pod by namespace and name
   */
  async getPod(
    this: NodeClientContext,
    namespace: string,
    name: string,
  ): Promise<Pod> {
    return requestJson(this, "GET", podPath(namespace, name), isPod);
  },

  /**
   * Create a Pod; resolves with the agent's view of it, which may differ
   * from what was sent (assigned status, defaults)
   */
  async createPod(this: NodeClientContext, pod: Pod): Promise<Pod> {
    const namespace = pod.metadata?.namespace || "default";
    return requestJson(this, "POST", podsPath(namespace), isPod, pod);
  },

  /**
   * Delete a Pod by namespace and name
   */
  async deletePod(
    this: NodeClientContext,
    namespace: string,
    name: string,
  ): Promise<void> {
    const response = await request(this, "DELETE", podPath(namespace, name));
    await readText(this, response);
  },

  async getPodLog(
    this: NodeClientContext,
    namespace: string,
    name: string,
  ): Promise<string> {
    const response = await request(
      this,
      "GET",
      `${podPath(namespace, name)}/log`,
    );
    return readText(this, response);
  },

  async getContainerLog(
    this: NodeClientContext,
    namespace: string,
    pod: string,
    container: string,
  ): Promise<string> {
    const response = await request(
      this,
      "GET",
      `${podPath(namespace, pod)}/log?container=${encodeURIComponent(container)}`,
    );
    return readText(this, response);
  },

  /**
   * Open a watch on the agent's pods. The body is newline-delimited JSON and
   * is left for the caller to read; aborting `signal` closes the connection.
   */
  async watchPods(
    this: NodeClientContext,
    signal?: AbortSignal,
  ): Promise<Response> {
    return request(this, "GET", "/api/v1/pods?watch=true", { signal });
  },
};
