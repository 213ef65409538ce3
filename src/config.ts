import { readFile, access } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigError } from "./errors.js";

/**
 * Logging configuration
 */
export interface LogConfig {
  /** Show each proxied request and its response status (default: true) */
  requests?: boolean;
  /** Show every rewrite and short-circuit applied (default: true) */
  rewrites?: boolean;
  /** Dump request and response bodies (default: false) */
  bodies?: boolean;
  /** Report headers skipped because they cannot cross the proxy (default: false) */
  headers?: boolean;
}

export interface Config {
  port?: number;
  /** URL every request is forwarded to */
  destination?: string;
  /** Abort outbound calls after this many milliseconds (default: no limit) */
  timeoutMs?: number;
  logging?: LogConfig;
}

export interface ResolvedConfig {
  port: number;
  destination: string;
  timeoutMs?: number;
  logging: Required<LogConfig>;
}

export const DEFAULT_PORT = 8545;

export const DEFAULT_LOGGING: Required<LogConfig> = {
  requests: true,
  rewrites: true,
  bodies: false,
  headers: false,
};

const CONFIG_BASENAME = "proxy.config";

/**
 * Supported config file extensions in order of precedence
 */
const CONFIG_EXTENSIONS = [".ts", ".js", ".json"] as const;
export type ConfigFormat = "ts" | "js" | "json";

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Turn a JS object literal into JSON: quote bare keys, drop comments
 * and trailing commas, convert single-quoted strings.
 */
function jsToJson(content: string): string {
  const strings: string[] = [];
  const hold = (literal: string) => {
    strings.push(literal);
    return `\u0000${strings.length - 1}\u0000`;
  };

  return content
    .replace(/"(?:[^"\\]|\\.)*"/g, hold)
    .replace(/'(?:[^'\\]|\\.)*'/g, (match) =>
      hold(`"${match.slice(1, -1).replace(/"/g, '\\"').replace(/\\'/g, "'")}"`)
    )
    .replace(/\/\/[^\n]*/g, "")
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .replace(/([{,]\s*)(\w+)\s*:/g, '$1"$2":')
    .replace(/,\s*([}\]])/g, "$1")
    .replace(/\u0000(\d+)\u0000/g, (_, index: string) => strings[Number(index)]);
}

/**
 * Slice out the object literal starting at `start` by counting braces outside strings
 */
function extractObject(content: string, start: number): string | null {
  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < content.length; i++) {
    const char = content[i];
    if ((char === '"' || char === "'" || char === "`") && content[i - 1] !== "\\") {
      if (quote === null) quote = char;
      else if (quote === char) quote = null;
    }
    if (quote !== null) continue;

    if (char === "{") depth++;
    if (char === "}" && --depth === 0) {
      return content.slice(start, i + 1);
    }
  }
  return null;
}

const OBJECT_PATTERNS = [
  /export\s+default\s*\{/,
  /export\s+const\s+config\s*=\s*\{/,
  /module\.exports\s*=\s*\{/,
  /defineConfig\s*\(\s*\{/,
];

/**
 * Read the exported object literal out of a TypeScript/JavaScript config file
 */
function parseTsJsConfig(content: string): unknown {
  for (const pattern of OBJECT_PATTERNS) {
    const match = pattern.exec(content);
    if (!match) continue;

    const literal = extractObject(content, match.index + match[0].length - 1);
    if (!literal) continue;
    try {
      return JSON.parse(jsToJson(literal));
    } catch {
      continue;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const LOG_KEYS = ["requests", "rewrites", "bodies", "headers"] as const;

/**
 * Check the shape of a parsed config file and copy out the known fields
 */
export function validateConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new Error("config must be an object");
  }

  const config: Config = {};
  const { port, destination, timeoutMs, logging } = value;
  if (port !== undefined) {
    if (typeof port !== "number") throw new Error("port must be a number");
    config.port = port;
  }
  if (destination !== undefined) {
    if (typeof destination !== "string") throw new Error("destination must be a string");
    config.destination = destination;
  }
  if (timeoutMs !== undefined) {
    if (typeof timeoutMs !== "number") throw new Error("timeoutMs must be a number");
    config.timeoutMs = timeoutMs;
  }
  if (logging !== undefined) {
    if (!isRecord(logging)) throw new Error("logging must be an object");
    const log: LogConfig = {};
    for (const key of LOG_KEYS) {
      const flag = logging[key];
      if (flag === undefined) continue;
      if (typeof flag !== "boolean") throw new Error(`logging.${key} must be a boolean`);
      log[key] = flag;
    }
    config.logging = log;
  }
  return config;
}

/**
 * Find the config file path. An explicit path without extension is tried
 * with each supported extension.
 */
export async function findConfigFile(cwd: string, configFile?: string): Promise<string | null> {
  if (configFile) {
    const configPath = isAbsolute(configFile) ? configFile : join(cwd, configFile);

    if (/\.(ts|js|json)$/.test(configFile)) {
      return (await fileExists(configPath)) ? configPath : null;
    }
    for (const ext of CONFIG_EXTENSIONS) {
      if (await fileExists(configPath + ext)) {
        return configPath + ext;
      }
    }
    return null;
  }

  for (const ext of CONFIG_EXTENSIONS) {
    const configPath = join(cwd, CONFIG_BASENAME + ext);
    if (await fileExists(configPath)) {
      return configPath;
    }
  }
  return null;
}

export function getConfigFormat(configPath: string): ConfigFormat {
  if (configPath.endsWith(".ts")) return "ts";
  if (configPath.endsWith(".js")) return "js";
  return "json";
}

export async function loadConfigFromPath(configPath: string): Promise<Config> {
  const content = await readFile(configPath, "utf-8");
  const format = getConfigFormat(configPath);

  if (format === "json") {
    return validateConfig(JSON.parse(content));
  }

  const config = parseTsJsConfig(content);
  if (config !== undefined) {
    return validateConfig(config);
  }

  // JS files the literal reader cannot handle are imported instead
  if (format === "js") {
    const module: { default?: unknown; config?: unknown } = await import(
      pathToFileURL(resolve(configPath)).href
    );
    const loaded = module.default ?? module.config;
    if (loaded !== undefined) return validateConfig(loaded);
  }

  throw new Error("no exported config object found");
}

/**
 * Load proxy.config.ts, proxy.config.js or proxy.config.json.
 * The file is optional, but one that exists must parse to a config object.
 */
export async function loadConfig(cwd: string, configFile?: string): Promise<Config> {
  const configPath = await findConfigFile(cwd, configFile);
  if (!configPath) {
    return {};
  }

  try {
    return await loadConfigFromPath(configPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config file ${configPath}: ${reason}`);
  }
}

/**
 * Merge CLI overrides over file config and defaults, then validate
 */
export function resolveConfig(config: Config, overrides: Config = {}): ResolvedConfig {
  const port = overrides.port ?? config.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${port}`);
  }

  const destination = overrides.destination ?? config.destination;
  if (!destination) {
    throw new ConfigError("No destination URL specified");
  }
  let protocol: string;
  try {
    protocol = new URL(destination).protocol;
  } catch {
    throw new ConfigError(`Invalid destination URL: ${destination}`);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ConfigError(`Destination must be an http(s) URL: ${destination}`);
  }

  const timeoutMs = overrides.timeoutMs ?? config.timeoutMs;
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new ConfigError(`Invalid timeout: ${timeoutMs}`);
  }

  return {
    port,
    destination,
    timeoutMs,
    logging: { ...DEFAULT_LOGGING, ...config.logging, ...overrides.logging },
  };
}
