/** Options accepted by every operation that reaches the network. */
export interface RequestOptions {
  /** Cancels the in-flight call. */
  signal?: AbortSignal
}
