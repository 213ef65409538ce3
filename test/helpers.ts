import { vi } from "vitest";

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  /** Outbound body decoded as UTF-8 */
  body?: string;
  bytes?: Buffer;
}

export const DESTINATION = "http://dest.test/jsonrpc";

function bodyBytes(body: RequestInit["body"]): Buffer | undefined {
  if (typeof body === "string") return Buffer.from(body);
  if (body instanceof Uint8Array) return Buffer.from(body);
  return undefined;
}

/**
 * Stand-in for the global fetch that records every outbound call
 */
export function recordingFetch(
  respond: (call: RecordedCall) => Response | Promise<Response>
) {
  const calls: RecordedCall[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const bytes = bodyBytes(init?.body);
    const call: RecordedCall = {
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: bytes?.toString("utf8"),
      bytes,
    };
    calls.push(call);
    return respond(call);
  });
  return { fetch, calls };
}

/**
 * Fetch that fails the way Node's fetch does on a refused connection
 */
export function refusingFetch() {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    throw new TypeError("fetch failed");
  });
}

export function jsonResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "application/json" },
  });
}
