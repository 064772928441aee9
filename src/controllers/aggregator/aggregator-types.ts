import type { NodeClient } from "../../utils/node-client/index.js";

// This interface defines the shape of the aggregator that will be used as 'this'
export interface AggregatorContext {
  /** Registry contents in configuration order, copied out before any I/O */
  snapshot(): NodeClient[];
  /** Registry lookup; throws NodeNotFoundError */
  requireClient(name: string): NodeClient;
}
