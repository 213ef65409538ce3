import chalk from "chalk";
import type { LogConfig } from "./config.js";
import type { ProxyEvent, ProxyObserver } from "./rpc/events.js";

type Writer = (line: string) => void;

const MAX_BODY_PREVIEW = 2000;

function preview(body: string): string {
  if (body.length <= MAX_BODY_PREVIEW) return body;
  return `${body.slice(0, MAX_BODY_PREVIEW)}... (${body.length} chars)`;
}

/**
 * Render one event, or null when the logging config hides it
 */
export function formatEvent(event: ProxyEvent, logging: Required<LogConfig>): string | null {
  switch (event.type) {
    case "request":
      return logging.requests
        ? chalk.yellow(`← ${event.method}`) + chalk.dim(` ${event.bytes} bytes`)
        : null;
    case "forward":
      return logging.requests ? chalk.dim(`  ⇢ ${event.httpMethod} ${event.url}`) : null;
    case "response": {
      if (!logging.requests) return null;
      const color = event.status < 400 ? chalk.green : chalk.red;
      return (
        color(`→ ${event.status}`) +
        chalk.dim(` ${event.bytes} bytes${event.modified ? " (rewritten)" : ""}`)
      );
    }
    case "rewrite":
      return logging.rewrites ? chalk.magenta(`  ✎ ${event.method}: ${event.detail}`) : null;
    case "short-circuit":
      return logging.rewrites ? chalk.magenta(`  ↩ ${event.method} answered without forwarding`) : null;
    case "passthrough":
      return logging.rewrites
        ? chalk.dim(`  ${event.direction} passed through: ${event.reason}`)
        : null;
    case "header-skipped":
      return logging.headers
        ? chalk.yellow(`  skipped ${event.direction} header ${event.name}: ${event.reason}`)
        : null;
    case "body":
      return logging.bodies ? chalk.dim(`  ${event.label}: ${preview(event.body)}`) : null;
    case "failure":
      // Failures are always shown
      return chalk.red(`✖ ${event.message}`);
  }
}

/**
 * Observer that prints events to the console
 */
export function createConsoleObserver(
  logging: Required<LogConfig>,
  write: Writer = (line) => console.log(line)
): ProxyObserver {
  return (event) => {
    const line = formatEvent(event, logging);
    if (line !== null) write(line);
  };
}
