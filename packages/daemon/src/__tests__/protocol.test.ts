import { describe, expect, it } from "vitest";
import {
  DaemonResponseSchema,
  MAX_REQUEST_BYTES,
  RESULT_SCHEMAS,
  decodeRequest,
  encodeError,
  encodeRequest,
  encodeResult,
} from "../protocol";

function decodeError(line: string): unknown {
  try {
    decodeRequest(line);
  } catch (error) {
    return error;
  }
  throw new Error("expected decodeRequest to throw");
}

describe("decodeRequest", () => {
  it("fills in the default workspace", () => {
    expect(decodeRequest('{"command":"send-message","prompt":"hi"}')).toEqual({
      command: "send-message",
      workspace: "default",
      prompt: "hi",
    });
  });

  it("keeps an explicit workspace and drops unknown fields", () => {
    expect(decodeRequest('{"command":"clear-session","workspace":"alpha","force":true}')).toEqual({
      command: "clear-session",
      workspace: "alpha",
    });
  });

  it("leaves the task filter unset when no workspace is given", () => {
    expect(decodeRequest('{"command":"list-tasks"}')).toEqual({ command: "list-tasks" });
  });

  it("rejects text that is not JSON", () => {
    expect(decodeError("send-message hi")).toMatchObject({
      code: "INVALID_REQUEST",
      message: "Request is not valid JSON",
    });
  });

  it.each([["[]"], ['"daemon-status"'], ['{"command":42}'], ["{}"]])("rejects %s without a command", (line) => {
    expect(decodeError(line)).toMatchObject({
      code: "INVALID_REQUEST",
      message: "Request must be a JSON object with a string command",
    });
  });

  it("names unknown commands", () => {
    expect(decodeError('{"command":"reboot"}')).toMatchObject({
      code: "UNKNOWN_COMMAND",
      message: 'Unknown command "reboot"',
    });
  });

  it("points at the field that does not fit", () => {
    expect(decodeError('{"command":"send-message"}')).toMatchObject({
      code: "INVALID_REQUEST",
      message: "send-message: prompt: Required",
    });
    expect(decodeError('{"command":"remove-task","taskId":""}')).toMatchObject({
      code: "INVALID_REQUEST",
      message: "remove-task: taskId: String must contain at least 1 character(s)",
    });
  });

  it("refuses oversized requests before parsing them", () => {
    const line = JSON.stringify({ command: "send-message", prompt: "x".repeat(MAX_REQUEST_BYTES) });
    expect(decodeError(line)).toMatchObject({
      code: "INVALID_REQUEST",
      message: "Request exceeds 1048576 bytes",
    });
  });
});

describe("encoding", () => {
  it("writes one line per message", () => {
    expect(encodeRequest({ command: "daemon-status" })).toBe('{"command":"daemon-status"}\n');
    expect(encodeResult({ cleared: true })).toBe('{"status":"ok","result":{"cleared":true}}\n');
    expect(encodeError({ code: "NOT_FOUND", message: "No task with id x" })).toBe(
      '{"status":"error","error":{"code":"NOT_FOUND","message":"No task with id x"}}\n'
    );
  });

  it("accepts only known error codes in responses", () => {
    expect(DaemonResponseSchema.safeParse({ status: "error", error: { code: "WORKSPACE_BUSY", message: "" } }).success)
      .toBe(true);
    expect(DaemonResponseSchema.safeParse({ status: "error", error: { code: "OOPS", message: "" } }).success).toBe(
      false
    );
  });

  it("validates results per command", () => {
    expect(RESULT_SCHEMAS["clear-session"].safeParse({ workspace: "alpha", cleared: false }).success).toBe(true);
    expect(RESULT_SCHEMAS["remove-task"].safeParse({ taskId: "abc", removed: false }).success).toBe(false);
  });
});
