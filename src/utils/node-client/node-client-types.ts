// Interface for the node client context (used as 'this' by the operations)
export interface NodeClientContext {
  name: string;
  address: string;
  timeoutMs: number;
}

export interface NodeClientOptions {
  /** Upper bound for every call to the agent, body included */
  timeoutMs?: number;
}
