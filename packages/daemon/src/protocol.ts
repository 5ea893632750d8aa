/**
 * Control-plane wire protocol.
 *
 * One newline-terminated JSON request per connection and one
 * newline-terminated JSON response. Requests are a tagged union on `command`;
 * responses are `{status: "ok", result}` or `{status: "error", error}`.
 */

import { DEFAULT_WORKSPACE, ERROR_CODES, type ErrorPayload, ValidationError } from "@burrow/core";
import { z } from "zod";

/** Requests larger than this are refused without being parsed. */
export const MAX_REQUEST_BYTES = 1024 * 1024;

export const DAEMON_COMMANDS = [
  "send-message",
  "start-interactive-session",
  "list-workspaces",
  "clear-session",
  "daemon-status",
  "add-task",
  "list-tasks",
  "remove-task",
] as const;

export type DaemonCommand = (typeof DAEMON_COMMANDS)[number];

const KNOWN_COMMANDS: ReadonlySet<string> = new Set(DAEMON_COMMANDS);

const workspaceField = z.string().default(DEFAULT_WORKSPACE);

export const DaemonRequestSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("send-message"), workspace: workspaceField, prompt: z.string() }),
  z.object({ command: z.literal("start-interactive-session"), workspace: workspaceField }),
  z.object({ command: z.literal("list-workspaces") }),
  z.object({ command: z.literal("clear-session"), workspace: workspaceField }),
  z.object({ command: z.literal("daemon-status") }),
  z.object({
    command: z.literal("add-task"),
    workspace: workspaceField,
    schedule: z.string(),
    prompt: z.string(),
  }),
  z.object({ command: z.literal("list-tasks"), workspace: z.string().optional() }),
  z.object({ command: z.literal("remove-task"), taskId: z.string().min(1) }),
]);

/** A request after defaults are applied. */
export type DaemonRequest = z.infer<typeof DaemonRequestSchema>;

/** A request as a client writes it; `workspace` may be left out. */
export type DaemonRequestInput = z.input<typeof DaemonRequestSchema>;

export type DaemonRequestMap = { [K in DaemonCommand]: Extract<DaemonRequest, { command: K }> };

export type DaemonRequestInputMap = { [K in DaemonCommand]: Extract<DaemonRequestInput, { command: K }> };

const TriggerSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("interval"), minutes: z.number() }),
  z.object({ kind: z.literal("once"), at: z.number() }),
]);

export const TaskSchema = z.object({
  id: z.string(),
  workspace: z.string(),
  schedule: z.string(),
  trigger: TriggerSchema,
  prompt: z.string(),
  nextRunAt: z.number().nullable(),
  lastRunAt: z.number().nullable(),
  lastResult: z.string().nullable(),
  status: z.enum(["scheduled", "firing", "done"]),
  createdAt: z.number(),
});

export const WorkspaceSummarySchema = z.object({
  name: z.string(),
  root: z.string(),
  createdAt: z.number(),
  hasSession: z.boolean(),
  sessionId: z.string().nullable(),
  sessionUpdatedAt: z.number().nullable(),
  taskCount: z.number(),
});

const TickReportSchema = z.object({
  startedAt: z.number(),
  due: z.number(),
  completed: z.number(),
  failed: z.number(),
  deferred: z.number(),
  skipped: z.number(),
});

export const ServerStatsSchema = z.object({
  activeConnections: z.number(),
  requests: z.number(),
  errors: z.number(),
});

export type ServerStats = z.infer<typeof ServerStatsSchema>;

const resultSchemas = {
  "send-message": z.object({
    workspace: z.string(),
    reply: z.string(),
    sessionId: z.string(),
    durationMs: z.number(),
  }),
  "start-interactive-session": z.object({
    workspace: z.string(),
    root: z.string(),
    sessionId: z.string().nullable(),
    hasSession: z.boolean(),
    transcriptPath: z.string(),
  }),
  "list-workspaces": z.object({ workspaces: z.array(WorkspaceSummarySchema) }),
  "clear-session": z.object({ workspace: z.string(), cleared: z.boolean() }),
  "daemon-status": z.object({
    pid: z.number(),
    startedAt: z.number(),
    uptimeMs: z.number(),
    socketPath: z.string(),
    busyWorkspaces: z.array(z.string()),
    scheduler: z.object({
      running: z.boolean(),
      tickIntervalMs: z.number(),
      ticks: z.number(),
      lastTickAt: z.number().nullable(),
      nextTickAt: z.number().nullable(),
      lastReport: TickReportSchema.nullable(),
    }),
    stats: ServerStatsSchema,
  }),
  "add-task": z.object({ task: TaskSchema }),
  "list-tasks": z.object({ tasks: z.array(TaskSchema) }),
  "remove-task": z.object({ taskId: z.string(), removed: z.literal(true) }),
};

export type DaemonResults = { [K in DaemonCommand]: z.infer<(typeof resultSchemas)[K]> };

export const RESULT_SCHEMAS: { [K in DaemonCommand]: z.ZodType<DaemonResults[K], z.ZodTypeDef, unknown> } =
  resultSchemas;

const ErrorPayloadSchema = z.object({ code: z.enum(ERROR_CODES), message: z.string() });

export const DaemonResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), result: z.unknown() }),
  z.object({ status: z.literal("error"), error: ErrorPayloadSchema }),
]);

export type DaemonResponse = z.infer<typeof DaemonResponseSchema>;

const CommandProbeSchema = z.object({ command: z.string() }).passthrough();

export function isDaemonCommand(value: string): value is DaemonCommand {
  return KNOWN_COMMANDS.has(value);
}

/**
 * Parses one request line. Throws `ValidationError` with `UNKNOWN_COMMAND`
 * for a command outside the protocol and `INVALID_REQUEST` for anything
 * else that does not fit.
 */
export function decodeRequest(line: string): DaemonRequest {
  if (Buffer.byteLength(line, "utf8") > MAX_REQUEST_BYTES) {
    throw new ValidationError("INVALID_REQUEST", `Request exceeds ${MAX_REQUEST_BYTES} bytes`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ValidationError("INVALID_REQUEST", "Request is not valid JSON");
  }

  const probe = CommandProbeSchema.safeParse(raw);
  if (!probe.success) {
    throw new ValidationError("INVALID_REQUEST", "Request must be a JSON object with a string command");
  }
  if (!isDaemonCommand(probe.data.command)) {
    throw new ValidationError("UNKNOWN_COMMAND", `Unknown command "${probe.data.command}"`);
  }

  const parsed = DaemonRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ValidationError("INVALID_REQUEST", `${probe.data.command}: ${where}: ${issue.message}`);
  }
  return parsed.data;
}

export function encodeRequest(request: DaemonRequestInput): string {
  return `${JSON.stringify(request)}\n`;
}

export function encodeResult(result: unknown): string {
  return `${JSON.stringify({ status: "ok", result })}\n`;
}

export function encodeError(error: ErrorPayload): string {
  return `${JSON.stringify({ status: "error", error })}\n`;
}
