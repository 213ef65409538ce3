/**
 * Structured events emitted while a request crosses the proxy.
 * Rules and the pipeline report through a ProxyObserver instead of logging.
 */
export type ProxyEvent =
  | { type: "request"; method: string; bytes: number }
  | { type: "passthrough"; direction: "request" | "response"; reason: string }
  | { type: "rewrite"; method: string; detail: string }
  | { type: "short-circuit"; method: string }
  | { type: "forward"; httpMethod: "GET" | "POST"; url: string }
  | { type: "response"; status: number; bytes: number; modified: boolean }
  | { type: "header-skipped"; direction: "outbound" | "inbound"; name: string; reason: string }
  | { type: "failure"; message: string }
  | { type: "body"; label: string; body: string };

export type ProxyObserver = (event: ProxyEvent) => void;

export const silentObserver: ProxyObserver = () => {};

/** Method name recorded for bodies that are not JSON-RPC requests */
export const UNKNOWN_METHOD = "unknown";
