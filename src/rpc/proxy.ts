import { GatewayError } from "../errors.js";
import type { ProxyObserver } from "./events.js";
import { fromFetchHeaders, toFetchHeaders, type HeaderSet } from "./headers.js";

export type FetchLike = typeof fetch;

export interface OutboundRequest {
  method: "GET" | "POST";
  /** Re-encoded query string, without the leading "?" */
  query?: string;
  headers: HeaderSet;
  body?: Buffer | string;
}

export interface DestinationResponse {
  status: number;
  headers: HeaderSet;
  body: Buffer;
}

export interface DestinationClientOptions {
  fetch?: FetchLike;
  /** Abort calls that take longer than this; unset means no proxy-level limit */
  timeoutMs?: number;
  observe: ProxyObserver;
}

/**
 * Client for the single fixed destination. Buffers the whole response and
 * turns every transport failure into a GatewayError. Never retries.
 */
export class DestinationClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs?: number;
  private readonly observe: ProxyObserver;

  constructor(
    private readonly destination: string,
    options: DestinationClientOptions
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.observe = options.observe;
  }

  async send(request: OutboundRequest): Promise<DestinationResponse> {
    const url = request.query ? `${this.destination}?${request.query}` : this.destination;
    this.observe({ type: "forward", httpMethod: request.method, url });

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers: toFetchHeaders(request.headers, this.observe),
        body: request.method === "POST" ? request.body ?? "" : undefined,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
      const body = Buffer.from(await response.arrayBuffer());
      return {
        status: response.status,
        headers: fromFetchHeaders(response.headers),
        body,
      };
    } catch (err) {
      const error = new GatewayError(this.destination, err);
      this.observe({ type: "failure", message: error.message });
      throw error;
    }
  }

  /**
   * Destination URL (for logging)
   */
  get url(): string {
    return this.destination;
  }
}
