import type { Hex } from "viem";
import {
  decodeResponse,
  encodeResponse,
  isJsonObject,
  type JsonRpcResponse,
  type JsonValue,
} from "./envelope.js";
import type { ProxyObserver } from "./events.js";

/** Substituted for a missing or malformed block stateRoot */
export const PLACEHOLDER_STATE_ROOT: Hex =
  "0x0101010101010101010101010101010101010101010101010101010101010101";

const HASH_LENGTH = 66;

export interface RuleResult<T> {
  value: T;
  changed: boolean;
}

/**
 * A response rule rewrites the `result` of a decoded response.
 * `error` is never touched.
 */
export type ResponseRule = (
  response: JsonRpcResponse,
  method: string,
  observe: ProxyObserver
) => RuleResult<JsonRpcResponse>;

/**
 * Explain why a stateRoot value needs replacing, or return null if it is usable
 */
export function stateRootProblem(value: JsonValue | undefined): string | null {
  if (value === undefined) return "missing stateRoot";
  if (typeof value !== "string") return "non-string stateRoot";
  if (value === "0x" || value.length !== HASH_LENGTH) {
    return `invalid stateRoot '${value}'`;
  }
  return null;
}

const fixStateRoot: ResponseRule = (response, method, observe) => {
  const block = response.result;
  if (!isJsonObject(block)) {
    return { value: response, changed: false };
  }

  const problem = stateRootProblem(block.stateRoot);
  if (problem === null) {
    return { value: response, changed: false };
  }

  observe({ type: "rewrite", method, detail: `replaced ${problem}` });
  return {
    value: { ...response, result: { ...block, stateRoot: PLACEHOLDER_STATE_ROOT } },
    changed: true,
  };
};

/**
 * Response rules keyed by the method of the original request
 */
export const RESPONSE_RULES: ReadonlyMap<string, ResponseRule> = new Map([
  ["eth_getBlockByNumber", fixStateRoot],
  ["eth_getBlockByHash", fixStateRoot],
]);

/**
 * Apply the rule for `method` to a destination response body.
 * Bodies without a rule, that do not decode, or that the rule leaves alone
 * come back as the same text.
 */
export function enhanceResponse(
  method: string,
  body: string,
  observe: ProxyObserver,
  rules: ReadonlyMap<string, ResponseRule> = RESPONSE_RULES
): RuleResult<string> {
  const rule = rules.get(method);
  if (!rule) {
    return { value: body, changed: false };
  }

  const decoded = decodeResponse(body);
  if (!decoded.ok) {
    observe({
      type: "passthrough",
      direction: "response",
      reason: `${method} response is not JSON-RPC: ${decoded.reason}`,
    });
    return { value: body, changed: false };
  }

  const { value, changed } = rule(decoded.value, method, observe);
  if (!changed) {
    return { value: body, changed: false };
  }
  return { value: encodeResponse(value), changed: true };
}
