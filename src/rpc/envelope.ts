import { isLosslessNumber, LosslessNumber, parse, stringify as losslessStringify } from "lossless-json";
import { EncodeError } from "../errors.js";

/**
 * Numbers whose text would not survive a float round trip (integers above
 * 2^53, trailing zeros, exponents) are held as LosslessNumber and written
 * back exactly as received.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | LosslessNumber
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface JsonRpcRequest {
  jsonrpc: string;
  method: string;
  params?: JsonValue;
  id?: JsonValue;
}

export interface JsonRpcResponse {
  jsonrpc: string;
  result?: JsonValue;
  error?: JsonValue;
  id?: JsonValue;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (isLosslessNumber(value)) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function parseNumber(text: string): number | LosslessNumber {
  const value = Number(text);
  return String(value) === text ? value : new LosslessNumber(text);
}

/**
 * Parse text into a top-level JSON object, or explain why it is not one
 */
function parseObject(text: string): DecodeResult<JsonObject> {
  let parsed: unknown;
  try {
    parsed = parse(text, null, parseNumber);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : "Invalid JSON" };
  }
  if (!isJsonValue(parsed) || !isJsonObject(parsed)) {
    return { ok: false, reason: "Body is not a JSON object" };
  }
  return { ok: true, value: parsed };
}

/**
 * Decode a JSON-RPC request envelope.
 * Requires string `jsonrpc` and `method`; `params` and `id` are kept only when present.
 */
export function decodeRequest(text: string): DecodeResult<JsonRpcRequest> {
  const parsed = parseObject(text);
  if (!parsed.ok) return parsed;

  const { jsonrpc, method } = parsed.value;
  if (typeof jsonrpc !== "string") {
    return { ok: false, reason: "Missing or non-string jsonrpc field" };
  }
  if (typeof method !== "string") {
    return { ok: false, reason: "Missing or non-string method field" };
  }

  const request: JsonRpcRequest = { jsonrpc, method };
  if ("params" in parsed.value) request.params = parsed.value.params;
  if ("id" in parsed.value) request.id = parsed.value.id;
  return { ok: true, value: request };
}

/**
 * Decode a JSON-RPC response envelope. Only `jsonrpc` is required.
 */
export function decodeResponse(text: string): DecodeResult<JsonRpcResponse> {
  const parsed = parseObject(text);
  if (!parsed.ok) return parsed;

  const { jsonrpc } = parsed.value;
  if (typeof jsonrpc !== "string") {
    return { ok: false, reason: "Missing or non-string jsonrpc field" };
  }

  const response: JsonRpcResponse = { jsonrpc };
  if ("result" in parsed.value) response.result = parsed.value.result;
  if ("error" in parsed.value) response.error = parsed.value.error;
  if ("id" in parsed.value) response.id = parsed.value.id;
  return { ok: true, value: response };
}

function stringify(what: string, value: JsonObject): string {
  let text: string | undefined;
  try {
    text = losslessStringify(value);
  } catch (err) {
    throw new EncodeError(what, err);
  }
  if (text === undefined) {
    throw new EncodeError(what, new TypeError("value has no JSON representation"));
  }
  return text;
}

export function encodeRequest(request: JsonRpcRequest): string {
  const out: JsonObject = { jsonrpc: request.jsonrpc, method: request.method };
  if (request.params !== undefined) out.params = request.params;
  if (request.id !== undefined) out.id = request.id;
  return stringify(`${request.method} request`, out);
}

export function encodeResponse(response: JsonRpcResponse): string {
  const out: JsonObject = { jsonrpc: response.jsonrpc };
  if (response.result !== undefined) out.result = response.result;
  if (response.error !== undefined) out.error = response.error;
  if (response.id !== undefined) out.id = response.id;
  return stringify("response", out);
}
