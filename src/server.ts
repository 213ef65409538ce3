import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import chalk from "chalk";
import { loadConfig, resolveConfig, type Config } from "./config.js";
import { ProxyNodeError } from "./errors.js";
import { createConsoleObserver } from "./logging.js";
import { silentObserver, type ProxyObserver } from "./rpc/events.js";
import { fromRawHeaders, toReplyHeaders } from "./rpc/headers.js";
import { ForwardingPipeline, type ProxyReply } from "./rpc/pipeline.js";
import type { FetchLike } from "./rpc/proxy.js";

export interface BuildServerOptions {
  destination: string;
  timeoutMs?: number;
  observe?: ProxyObserver;
  fetch?: FetchLike;
}

const BODY_LIMIT = 16 * 1024 * 1024;

/**
 * Query string of a request URL, re-encoded; empty when there is none
 */
export function reencodeQuery(url: string): string {
  const index = url.indexOf("?");
  if (index === -1) return "";
  return new URLSearchParams(url.slice(index + 1)).toString();
}

/**
 * Create the proxy's Fastify instance without listening
 */
export function buildServer(options: BuildServerOptions): FastifyInstance {
  const observe = options.observe ?? silentObserver;
  const pipeline = new ForwardingPipeline({
    destination: options.destination,
    fetch: options.fetch,
    timeoutMs: options.timeoutMs,
    observe,
  });

  const server = Fastify({ bodyLimit: BODY_LIMIT });

  // Bodies reach the pipeline as raw bytes, whatever their content type
  server.removeAllContentTypeParsers();
  server.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  const send = (reply: FastifyReply, result: ProxyReply) =>
    reply
      .status(result.status)
      .headers(toReplyHeaders(result.headers, observe))
      .send(result.body);

  server.post("/", async (request, reply) => {
    const body = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const result = await pipeline.handleRpc(body, fromRawHeaders(request.raw.rawHeaders));
    return send(reply, result);
  });

  server.get("/", async (request, reply) => {
    const result = await pipeline.handlePassthrough(
      reencodeQuery(request.url),
      fromRawHeaders(request.raw.rawHeaders)
    );
    return send(reply, result);
  });

  // Any other method or path is relayed as a parameterless GET
  server.setNotFoundHandler(async (request, reply) => {
    const result = await pipeline.handlePassthrough("", fromRawHeaders(request.raw.rawHeaders));
    return send(reply, result);
  });

  server.setErrorHandler((error, _request, reply) => {
    if (error instanceof ProxyNodeError) {
      return reply.status(error.statusCode).type("text/plain").send(error.message);
    }
    observe({ type: "failure", message: error.message });
    return reply
      .status(error.statusCode ?? 500)
      .type("text/plain")
      .send(error.statusCode ? error.message : "Internal proxy error");
  });

  return server;
}

interface ServerOptions {
  port?: number;
  destination?: string;
  timeoutMs?: number;
  configPath?: string;
  logging?: Config["logging"];
}

export async function startServer(options: ServerOptions) {
  const fileConfig = await loadConfig(process.cwd(), options.configPath);
  const config = resolveConfig(fileConfig, {
    port: options.port,
    destination: options.destination,
    timeoutMs: options.timeoutMs,
    logging: options.logging,
  });

  const server = buildServer({
    destination: config.destination,
    timeoutMs: config.timeoutMs,
    observe: createConsoleObserver(config.logging),
  });

  await server.listen({ port: config.port, host: "0.0.0.0" });

  const address = server.addresses()[0];
  console.log(chalk.green(`\nrpc-rewrite-proxy listening on port ${address?.port ?? config.port}`));
  console.log(chalk.dim(`Destination: ${config.destination}`));
  console.log(
    chalk.dim(
      `Timeout: ${config.timeoutMs === undefined ? "transport default" : `${config.timeoutMs}ms`}`
    )
  );
  console.log(chalk.dim("Waiting for requests...\n"));

  process.on("SIGINT", () => {
    server.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  });

  return { server, config };
}
