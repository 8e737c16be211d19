/**
 * Carried from the gRPC call down to every storage statement.
 * `signal` aborts when the client cancels or the deadline passes.
 */
export interface RequestContext {
  readonly signal?: AbortSignal;
  readonly requestId?: string;
}
