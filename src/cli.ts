import { program } from "commander";
import chalk from "chalk";
import { startServer } from "./server.js";
import { ConfigError } from "./errors.js";
import type { LogConfig } from "./config.js";

interface StartOptions {
  port?: string;
  dest?: string;
  config?: string;
  timeout?: string;
  quiet?: boolean;
  verbose?: boolean;
}

function parseNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

function loggingFromFlags(options: StartOptions): LogConfig | undefined {
  if (options.quiet) {
    return { requests: false, rewrites: false, bodies: false, headers: false };
  }
  if (options.verbose) {
    return { requests: true, rewrites: true, bodies: true, headers: true };
  }
  return undefined;
}

program
  .name("rpc-rewrite-proxy")
  .description("JSON-RPC reverse proxy that patches requests and responses for EVM-compatible nodes")
  .version("1.0.0")
  .option("-p, --port <number>", "Port to listen on (default: 8545)")
  .option("-d, --dest <url>", "Destination URL to forward requests to")
  .option("-c, --config <path>", "Path to config file")
  .option("-t, --timeout <ms>", "Abort destination calls after this many milliseconds")
  .option("-q, --quiet", "Disable request logging")
  .option("-v, --verbose", "Also log bodies and skipped headers")
  .action(async (options: StartOptions) => {
    try {
      await startServer({
        port: parseNumber("--port", options.port),
        destination: options.dest,
        timeoutMs: parseNumber("--timeout", options.timeout),
        configPath: options.config,
        logging: loggingFromFlags(options),
      });
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(chalk.red(`\n✖ Error: ${err.message}\n`));
        console.log("Provide a destination with --dest or in proxy.config.json:");
        console.log(chalk.cyan("  rpc-rewrite-proxy --port 8545 --dest https://node.example/jsonrpc\n"));
        process.exit(1);
      }
      throw err;
    }
  });

await program.parseAsync();
