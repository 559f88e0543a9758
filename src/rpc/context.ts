import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation data describing the inbound server call being handled. */
export interface InboundCallContext {
  readonly requestId: string | number;
  readonly method: string;
  readonly sessionId: string | null;
}

/**
 * AsyncLocalStorage exposing the inbound call context to user callbacks and to
 * the logger, so entries emitted while a tool runs carry the originating
 * request id and session id.
 */
const storage = new AsyncLocalStorage<InboundCallContext>();

/** Runs `callback` with `context` visible through {@link getInboundCallContext}. */
export function runWithInboundCallContext<T>(context: InboundCallContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the inbound call context of the current async execution, if any. */
export function getInboundCallContext(): InboundCallContext | undefined {
  return storage.getStore();
}
