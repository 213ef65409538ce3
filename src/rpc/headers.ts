import { validateHeaderName, validateHeaderValue } from "node:http";
import type { ProxyObserver } from "./events.js";

export type HeaderEntry = readonly [name: string, value: string];

/** Header fields in receipt order; a repeated name appears once per value */
export type HeaderSet = HeaderEntry[];

// Framed by the outbound client itself; handing them over breaks the request
const TRANSPORT_MANAGED = new Set([
  "host",
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
  "expect",
  "content-length",
]);

// Describe the destination's connection, not ours
const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
]);

/**
 * Build a header set from Node's flat raw header list ([name, value, name, value, ...])
 */
export function fromRawHeaders(raw: readonly string[]): HeaderSet {
  const headers: HeaderSet = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    headers.push([raw[i], raw[i + 1]]);
  }
  return headers;
}

export function fromFetchHeaders(source: Headers): HeaderSet {
  const headers: HeaderSet = [];
  for (const [name, value] of source) {
    // Headers iteration joins set-cookie values, which must stay separate
    if (name === "set-cookie") continue;
    headers.push([name, value]);
  }
  for (const cookie of source.getSetCookie()) {
    headers.push(["set-cookie", cookie]);
  }
  return headers;
}

export function hasHeader(headers: HeaderSet, name: string): boolean {
  const key = name.toLowerCase();
  return headers.some(([n]) => n.toLowerCase() === key);
}

export function getHeader(headers: HeaderSet, name: string): string | undefined {
  const key = name.toLowerCase();
  return headers.find(([n]) => n.toLowerCase() === key)?.[1];
}

/**
 * Policy filter for JSON-RPC requests: the body may be rewritten,
 * so the caller's content-length never crosses the proxy.
 */
export function filterRpcRequestHeaders(headers: HeaderSet): HeaderSet {
  return headers.filter(([name]) => name.toLowerCase() !== "content-length");
}

/**
 * Convert a header set into fetch Headers. Transport-managed fields are left
 * to the client, and any field the client rejects is skipped on its own.
 */
export function toFetchHeaders(headers: HeaderSet, observe: ProxyObserver): Headers {
  const out = new Headers();
  for (const [name, value] of headers) {
    if (TRANSPORT_MANAGED.has(name.toLowerCase())) continue;
    try {
      out.append(name, value);
    } catch (err) {
      observe({
        type: "header-skipped",
        direction: "outbound",
        name,
        reason: err instanceof Error ? err.message : "rejected by client",
      });
    }
  }
  return out;
}

/**
 * Frame destination headers for a relayed body of `bodyLength` bytes.
 *
 * The outbound client has already decoded any content-encoding, and a
 * declared content-length always matches the bytes actually sent.
 * A 204 carries no content-length; a 304 keeps the one describing the
 * original representation, if any.
 */
export function frameResponseHeaders(
  headers: HeaderSet,
  bodyLength: number,
  status: number
): HeaderSet {
  const bodiless = status === 204 || status === 304;
  const declared = getHeader(headers, "content-length");
  const keepLength =
    status === 304 || (declared !== undefined && declared.trim() === String(bodyLength));

  const framed: HeaderSet = headers.filter(([name]) => {
    const key = name.toLowerCase();
    if (HOP_BY_HOP.has(key) || key === "content-encoding") return false;
    if (key === "content-length") return status !== 204 && keepLength;
    return true;
  });

  if (!keepLength && !bodiless) {
    framed.push(["content-length", String(bodyLength)]);
  }
  return framed;
}

/**
 * Group a header set for the server reply, dropping fields it cannot emit
 */
export function toReplyHeaders(
  headers: HeaderSet,
  observe: ProxyObserver
): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const [name, value] of headers) {
    try {
      validateHeaderName(name);
      validateHeaderValue(name, value);
    } catch (err) {
      observe({
        type: "header-skipped",
        direction: "inbound",
        name,
        reason: err instanceof Error ? err.message : "invalid header",
      });
      continue;
    }
    const key = name.toLowerCase();
    const existing = out[key];
    if (existing === undefined) {
      out[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      out[key] = [existing, value];
    }
  }
  return out;
}
