/**
 * Burrow Error Types
 *
 * Every failure that can reach a client carries a stable code from
 * `ErrorCode` plus a human-readable message.
 */

export const ERROR_CODES = [
  "INVALID_REQUEST",
  "UNKNOWN_COMMAND",
  "INVALID_WORKSPACE_NAME",
  "INVALID_SCHEDULE",
  "INVALID_CONFIG",
  "NOT_FOUND",
  "STORE_UNAVAILABLE",
  "WORKSPACE_MISSING",
  "SANDBOX_POLICY",
  "WORKSPACE_BUSY",
  "INVOCATION_FAILED",
  "INVOCATION_TIMEOUT",
  "MALFORMED_OUTPUT",
  "SPAWN_FAILED",
  "ENDPOINT_IN_USE",
  "DAEMON_NOT_RUNNING",
  "SHUTTING_DOWN",
  "INTERNAL",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export class BurrowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BurrowError";
    this.code = code;
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

export type ValidationErrorCode =
  | "INVALID_REQUEST"
  | "UNKNOWN_COMMAND"
  | "INVALID_WORKSPACE_NAME"
  | "INVALID_SCHEDULE"
  | "INVALID_CONFIG";

/** Rejected synchronously at the API boundary; never reaches the invoker. */
export class ValidationError extends BurrowError {
  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends BurrowError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class StoreError extends BurrowError {
  constructor(message: string, options?: ErrorOptions) {
    super("STORE_UNAVAILABLE", message, options);
    this.name = "StoreError";
  }
}

export class SandboxPolicyError extends BurrowError {
  constructor(code: "WORKSPACE_MISSING" | "SANDBOX_POLICY", message: string) {
    super(code, message);
    this.name = "SandboxPolicyError";
  }
}

export class WorkspaceBusyError extends BurrowError {
  readonly workspace: string;

  constructor(workspace: string) {
    super("WORKSPACE_BUSY", `Workspace ${workspace} is busy, retry later`);
    this.name = "WorkspaceBusyError";
    this.workspace = workspace;
  }
}

export type InvocationErrorCode =
  | "INVOCATION_FAILED"
  | "INVOCATION_TIMEOUT"
  | "MALFORMED_OUTPUT"
  | "SPAWN_FAILED";

export class InvocationError extends BurrowError {
  constructor(code: InvocationErrorCode, message: string) {
    super(code, message);
    this.name = "InvocationError";
  }
}

export class EndpointInUseError extends BurrowError {
  readonly endpoint: string;

  constructor(endpoint: string) {
    super("ENDPOINT_IN_USE", `Another daemon is already listening on ${endpoint}`);
    this.name = "EndpointInUseError";
    this.endpoint = endpoint;
  }
}

export class DaemonUnavailableError extends BurrowError {
  constructor(message = "Daemon not running. Start it with: burrow daemon") {
    super("DAEMON_NOT_RUNNING", message);
    this.name = "DaemonUnavailableError";
  }
}

export function isBurrowError(error: unknown): error is BurrowError {
  return error instanceof BurrowError;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (isBurrowError(error)) {
    return error.toPayload();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "INTERNAL", message };
}
