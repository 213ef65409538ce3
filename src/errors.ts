/**
 * Base class for all errors that reach the caller as an HTTP status
 */
export abstract class ProxyNodeError extends Error {
  abstract readonly statusCode: number;
}

/**
 * Destination could not be reached or its response could not be read
 */
export class GatewayError extends ProxyNodeError {
  readonly statusCode = 502;
  readonly destination: string;

  constructor(destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : "Unknown transport error";
    super(`Failed to forward request to ${destination}: ${reason}`, { cause });
    this.name = "GatewayError";
    this.destination = destination;
  }
}

/**
 * A transformed envelope could not be serialized again
 */
export class EncodeError extends ProxyNodeError {
  readonly statusCode = 500;

  constructor(what: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to encode ${what}: ${reason}`, { cause });
    this.name = "EncodeError";
  }
}

/**
 * Invalid startup configuration (port, destination)
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
