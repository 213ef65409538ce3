export { buildServer, startServer, reencodeQuery, type BuildServerOptions } from "./server.js";
export {
  loadConfig,
  resolveConfig,
  type Config,
  type LogConfig,
  type ResolvedConfig,
} from "./config.js";
export { ProxyNodeError, GatewayError, EncodeError, ConfigError } from "./errors.js";
export { createConsoleObserver, formatEvent } from "./logging.js";
export {
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type JsonValue,
  type DecodeResult,
} from "./rpc/envelope.js";
export {
  interceptRequest,
  normalizeCallObject,
  REQUEST_RULES,
  type RequestRule,
  type InterceptOutcome,
} from "./rpc/interceptor.js";
export {
  enhanceResponse,
  stateRootProblem,
  PLACEHOLDER_STATE_ROOT,
  RESPONSE_RULES,
  type ResponseRule,
  type RuleResult,
} from "./rpc/enhancer.js";
export { ForwardingPipeline, type PipelineOptions, type ProxyReply } from "./rpc/pipeline.js";
export { DestinationClient, type FetchLike } from "./rpc/proxy.js";
export { silentObserver, type ProxyEvent, type ProxyObserver } from "./rpc/events.js";
export type { HeaderSet, HeaderEntry } from "./rpc/headers.js";
