import Fastify, { type FastifyInstance } from "fastify";
import { buildServer } from "../../src/server.js";

export interface TestContext {
  proxy: FastifyInstance;
  destination: FastifyInstance;
  /** Bodies of every POST the destination received */
  received: unknown[];
  proxyUrl: string;
}

function urlOf(server: FastifyInstance): string {
  const address = server.addresses()[0];
  return `http://127.0.0.1:${address.port}`;
}

/**
 * Stand-in node: answers block queries with an empty stateRoot and echoes
 * everything else.
 */
async function startDestination(received: unknown[]): Promise<FastifyInstance> {
  const destination = Fastify();

  destination.post("/jsonrpc", async (request) => {
    received.push(request.body);
    const body = request.body as { method?: string; id?: unknown };
    if (body.method === "eth_getBlockByHash") {
      return { jsonrpc: "2.0", result: { hash: "0x2", stateRoot: "0x" }, id: body.id };
    }
    return { jsonrpc: "2.0", result: "0x1", id: body.id };
  });

  destination.get("/jsonrpc", async (request) => ({ query: request.query }));

  await destination.listen({ port: 0, host: "127.0.0.1" });
  return destination;
}

/**
 * Start a destination and a proxy in front of it, both on random ports
 */
export async function startTestProxy(): Promise<TestContext> {
  const received: unknown[] = [];
  const destination = await startDestination(received);
  const proxy = buildServer({ destination: `${urlOf(destination)}/jsonrpc` });
  await proxy.listen({ port: 0, host: "127.0.0.1" });

  return { proxy, destination, received, proxyUrl: urlOf(proxy) };
}

/**
 * A URL on which nothing listens: bind a port, then release it
 */
export async function unusedUrl(): Promise<string> {
  const placeholder = Fastify();
  await placeholder.listen({ port: 0, host: "127.0.0.1" });
  const url = urlOf(placeholder);
  await placeholder.close();
  return url;
}

export async function stopTestProxy(ctx: TestContext): Promise<void> {
  await ctx.proxy.close();
  await ctx.destination.close();
}
