export { DaemonClient, type DaemonClientOptions } from "./client";
export { ControlServer, type ControlServerOptions, type RequestHandler } from "./controlServer";
export { BurrowDaemon, type BurrowDaemonOptions } from "./daemon";
export {
  PROBE_TIMEOUT_MS,
  acquireEndpoint,
  releaseEndpoint,
  writePidFile,
  type AcquireEndpointOptions,
  type EndpointPaths,
} from "./endpoint";
export {
  createDaemonHandlers,
  dispatchRequest,
  type DaemonHandlers,
  type HandlerContext,
  type HandlerStore,
} from "./handlers";
export {
  DAEMON_COMMANDS,
  DaemonRequestSchema,
  DaemonResponseSchema,
  MAX_REQUEST_BYTES,
  RESULT_SCHEMAS,
  TaskSchema,
  WorkspaceSummarySchema,
  decodeRequest,
  encodeError,
  encodeRequest,
  encodeResult,
  isDaemonCommand,
  type DaemonCommand,
  type DaemonRequest,
  type DaemonRequestInput,
  type DaemonRequestInputMap,
  type DaemonRequestMap,
  type DaemonResponse,
  type DaemonResults,
  type ServerStats,
} from "./protocol";
