import { toHex } from "viem";
import { isJsonObject, type JsonObject, type JsonRpcRequest, type JsonRpcResponse } from "./envelope.js";
import type { ProxyObserver } from "./events.js";

export type InterceptOutcome =
  | { kind: "forward"; request: JsonRpcRequest; changed: boolean }
  | { kind: "respond"; response: JsonRpcResponse };

/**
 * A request rule receives the decoded request and returns either the request
 * to forward (with a changed flag) or a complete response for the caller.
 * Rules never mutate their input.
 */
export type RequestRule = (
  request: JsonRpcRequest,
  observe: ProxyObserver
) => InterceptOutcome;

/**
 * The destination keeps no usable nonce for callers, so every account
 * reports a transaction count of zero.
 */
const fixedTransactionCount: RequestRule = (request, observe) => {
  observe({
    type: "rewrite",
    method: request.method,
    detail: "answered locally with 0x0",
  });
  return {
    kind: "respond",
    response: { jsonrpc: "2.0", result: toHex(0), id: request.id },
  };
};

/**
 * Normalize an eth_call object: `input` becomes `data` (an existing `data`
 * wins), and `chainId` is removed.
 */
export function normalizeCallObject(call: JsonObject): { call: JsonObject; notes: string[] } {
  const { input, chainId: _chainId, ...rest } = call;
  const notes: string[] = [];

  if ("input" in call) {
    if ("data" in rest) {
      notes.push("removed 'input' (keeping 'data')");
    } else {
      rest.data = input;
      notes.push("renamed 'input' to 'data'");
    }
  }
  if ("chainId" in call) {
    notes.push("removed 'chainId'");
  }

  return { call: notes.length > 0 ? rest : call, notes };
}

const normalizeEthCall: RequestRule = (request, observe) => {
  const { params } = request;
  if (!Array.isArray(params) || params.length === 0) {
    return { kind: "forward", request, changed: false };
  }
  const [first, ...others] = params;
  if (!isJsonObject(first)) {
    return { kind: "forward", request, changed: false };
  }

  const { call, notes } = normalizeCallObject(first);
  if (notes.length === 0) {
    return { kind: "forward", request, changed: false };
  }

  for (const detail of notes) {
    observe({ type: "rewrite", method: request.method, detail });
  }
  return {
    kind: "forward",
    request: { ...request, params: [call, ...others] },
    changed: true,
  };
};

/**
 * Request rules keyed by exact, case-sensitive method name
 */
export const REQUEST_RULES: ReadonlyMap<string, RequestRule> = new Map([
  ["eth_getTransactionCount", fixedTransactionCount],
  ["eth_call", normalizeEthCall],
]);

export function interceptRequest(
  request: JsonRpcRequest,
  observe: ProxyObserver,
  rules: ReadonlyMap<string, RequestRule> = REQUEST_RULES
): InterceptOutcome {
  const rule = rules.get(request.method);
  if (!rule) {
    return { kind: "forward", request, changed: false };
  }
  return rule(request, observe);
}
