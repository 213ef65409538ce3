import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { buildServer } from "../../src/server.js";
import { PLACEHOLDER_STATE_ROOT } from "../../src/rpc/enhancer.js";
import { startTestProxy, stopTestProxy, unusedUrl, type TestContext } from "./helper.js";

function rpc(url: string, body: string): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("Integration: proxy in front of a live destination", () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await startTestProxy();
  });

  afterAll(async () => {
    await stopTestProxy(ctx);
  });

  it("should answer eth_getTransactionCount without reaching the destination", async () => {
    const before = ctx.received.length;
    const res = await rpc(
      ctx.proxyUrl,
      '{"jsonrpc":"2.0","method":"eth_getTransactionCount","params":["0x1","latest"],"id":11}'
    );

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('{"jsonrpc":"2.0","result":"0x0","id":11}');
    expect(ctx.received.length).toBe(before);
  });

  it("should forward a normalized eth_call", async () => {
    const res = await rpc(
      ctx.proxyUrl,
      '{"jsonrpc":"2.0","method":"eth_call","params":[{"to":"0x1","input":"0xabc","chainId":"0x2b6"}],"id":12}'
    );

    expect(await res.json()).toEqual({ jsonrpc: "2.0", result: "0x1", id: 12 });
    expect(ctx.received.at(-1)).toEqual({
      jsonrpc: "2.0",
      method: "eth_call",
      params: [{ to: "0x1", data: "0xabc" }],
      id: 12,
    });
  });

  it("should patch stateRoot with a matching content-length", async () => {
    const res = await rpc(
      ctx.proxyUrl,
      '{"jsonrpc":"2.0","method":"eth_getBlockByHash","params":["0x2",false],"id":13}'
    );
    const text = await res.text();

    expect(JSON.parse(text)).toEqual({
      jsonrpc: "2.0",
      result: { hash: "0x2", stateRoot: PLACEHOLDER_STATE_ROOT },
      id: 13,
    });
    expect(res.headers.get("content-length")).toBe(String(Buffer.byteLength(text)));
  });

  it("should relay GET query parameters", async () => {
    const res = await fetch(`${ctx.proxyUrl}/?address=test-addr&visible=true`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ query: { address: "test-addr", visible: "true" } });
  });

  it("should answer 502 for POST and GET when the destination refuses connections", async () => {
    const proxy = buildServer({ destination: await unusedUrl() });
    try {
      const post = await proxy.inject({
        method: "POST",
        url: "/",
        headers: { "content-type": "application/json" },
        payload: '{"jsonrpc":"2.0","method":"eth_chainId","id":1}',
      });
      const get = await proxy.inject({ method: "GET", url: "/" });

      expect(post.statusCode).toBe(502);
      expect(get.statusCode).toBe(502);
    } finally {
      await proxy.close();
    }
  });
});
