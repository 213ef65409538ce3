import { decodeRequest, encodeRequest, encodeResponse } from "./envelope.js";
import { enhanceResponse, RESPONSE_RULES, type ResponseRule } from "./enhancer.js";
import { silentObserver, UNKNOWN_METHOD, type ProxyObserver } from "./events.js";
import {
  filterRpcRequestHeaders,
  frameResponseHeaders,
  type HeaderSet,
} from "./headers.js";
import { interceptRequest, REQUEST_RULES, type RequestRule } from "./interceptor.js";
import { DestinationClient, type FetchLike } from "./proxy.js";

export interface ProxyReply {
  status: number;
  headers: HeaderSet;
  body: Buffer;
}

export interface PipelineOptions {
  destination: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  observe?: ProxyObserver;
  requestRules?: ReadonlyMap<string, RequestRule>;
  responseRules?: ReadonlyMap<string, ResponseRule>;
}

/**
 * Runs one inbound request through decode, interception, forwarding,
 * enhancement and re-framing. Holds no per-request state, so a single
 * instance serves all concurrent requests.
 */
export class ForwardingPipeline {
  private readonly client: DestinationClient;
  private readonly observe: ProxyObserver;
  private readonly requestRules: ReadonlyMap<string, RequestRule>;
  private readonly responseRules: ReadonlyMap<string, ResponseRule>;

  constructor(options: PipelineOptions) {
    this.observe = options.observe ?? silentObserver;
    this.client = new DestinationClient(options.destination, {
      fetch: options.fetch,
      timeoutMs: options.timeoutMs,
      observe: this.observe,
    });
    this.requestRules = options.requestRules ?? REQUEST_RULES;
    this.responseRules = options.responseRules ?? RESPONSE_RULES;
  }

  get destination(): string {
    return this.client.url;
  }

  /**
   * POST traffic: JSON-RPC aware forwarding. The body is decoded as text
   * only to look for an envelope; unless a rule rewrites it, the original
   * bytes are what the destination receives.
   */
  async handleRpc(rawBody: Buffer | string, headers: HeaderSet): Promise<ProxyReply> {
    const raw = typeof rawBody === "string" ? Buffer.from(rawBody) : rawBody;
    const text = raw.toString("utf8");
    const decoded = decodeRequest(text);
    const method = decoded.ok ? decoded.value.method : UNKNOWN_METHOD;
    this.observe({ type: "request", method, bytes: raw.length });
    this.observe({ type: "body", label: "request body", body: text });

    let outbound: Buffer | string = raw;
    if (decoded.ok) {
      const outcome = interceptRequest(decoded.value, this.observe, this.requestRules);
      if (outcome.kind === "respond") {
        this.observe({ type: "short-circuit", method });
        const body = Buffer.from(encodeResponse(outcome.response));
        this.observe({ type: "response", status: 200, bytes: body.length, modified: true });
        return {
          status: 200,
          headers: [
            ["content-type", "application/json"],
            ["content-length", String(body.length)],
          ],
          body,
        };
      }
      if (outcome.changed) {
        outbound = encodeRequest(outcome.request);
        this.observe({ type: "body", label: "rewritten request body", body: outbound });
      }
    } else {
      this.observe({
        type: "passthrough",
        direction: "request",
        reason: `not a JSON-RPC request: ${decoded.reason}`,
      });
    }

    const upstream = await this.client.send({
      method: "POST",
      headers: filterRpcRequestHeaders(headers),
      body: outbound,
    });

    let body = upstream.body;
    let modified = false;
    if (this.responseRules.has(method)) {
      const text = body.toString("utf8");
      this.observe({ type: "body", label: "destination body", body: text });
      const enhanced = enhanceResponse(method, text, this.observe, this.responseRules);
      if (enhanced.changed) {
        body = Buffer.from(enhanced.value);
        modified = true;
      }
    }

    this.observe({ type: "response", status: upstream.status, bytes: body.length, modified });
    return {
      status: upstream.status,
      headers: frameResponseHeaders(upstream.headers, body.length, upstream.status),
      body,
    };
  }

  /**
   * GET and fallback traffic: relayed without JSON-RPC interpretation.
   * An empty query forwards to the bare destination URL.
   */
  async handlePassthrough(query: string, headers: HeaderSet): Promise<ProxyReply> {
    const upstream = await this.client.send({ method: "GET", query, headers });
    this.observe({
      type: "response",
      status: upstream.status,
      bytes: upstream.body.length,
      modified: false,
    });
    return {
      status: upstream.status,
      headers: frameResponseHeaders(upstream.headers, upstream.body.length, upstream.status),
      body: upstream.body,
    };
  }
}
