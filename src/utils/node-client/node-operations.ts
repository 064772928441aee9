import { isNode } from "../../models/guards.js";
import type { Node } from "../../models/types.js";
import type { NodeClientContext } from "./node-client-types.js";
import { requestJson } from "./transport.js";

export const nodeOperations = {
  /**
   * Get the Node object the agent reports for itself
   */
  async getNode(this: NodeClientContext): Promise<Node> {
    return requestJson(
      this,
      "GET",
      `/api/v1/nodes/${encodeURIComponent(this.name)}`,
      isNode,
    );
  },
};
