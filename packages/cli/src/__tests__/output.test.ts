import { describe, expect, it } from "vitest";
import {
  formatDuration,
  formatStatus,
  formatTasks,
  formatTimestamp,
  formatTools,
  formatWorkspaces,
  truncate,
} from "../utils/output";

const T0 = Date.parse("2026-03-01T10:00:00Z");

describe("output formatting", () => {
  it("truncates previews on one line", () => {
    expect(truncate("short")).toBe("short");
    expect(truncate("line one\n  line two")).toBe("line one line two");
    expect(truncate("a".repeat(61))).toBe(`${"a".repeat(60)}...`);
  });

  it("formats timestamps and durations", () => {
    expect(formatTimestamp(T0)).toBe("2026-03-01 10:00:00Z");
    expect(formatDuration(999)).toBe("0s");
    expect(formatDuration(60_000)).toBe("1m 0s");
    expect(formatDuration(65_000)).toBe("1m 5s");
    expect(formatDuration(3_723_000)).toBe("1h 2m 3s");
  });

  it("lists workspaces in aligned columns", () => {
    expect(formatWorkspaces([])).toBe("No workspaces yet.");
    expect(
      formatWorkspaces([
        {
          name: "alpha",
          root: "/w/alpha",
          createdAt: T0,
          hasSession: true,
          sessionId: "s1",
          sessionUpdatedAt: T0,
          taskCount: 2,
        },
        {
          name: "research",
          root: "/w/research",
          createdAt: T0,
          hasSession: false,
          sessionId: null,
          sessionUpdatedAt: null,
          taskCount: 0,
        },
      ])
    ).toBe("  alpha     session=active  tasks=2\n  research  session=none  tasks=0");
  });

  it("lists tasks with their next and last runs", () => {
    expect(formatTasks([])).toBe("No scheduled tasks.");
    expect(
      formatTasks([
        {
          id: "ab12cd34",
          workspace: "alpha",
          schedule: "@daily",
          trigger: { kind: "interval", minutes: 1440 },
          prompt: "summarize the inbox",
          nextRunAt: T0 + 86_400_000,
          lastRunAt: null,
          lastResult: null,
          status: "scheduled",
          createdAt: T0,
        },
        {
          id: "ef56ab78",
          workspace: "beta",
          schedule: "once:+5m",
          trigger: { kind: "once", at: T0 },
          prompt: "ping",
          nextRunAt: null,
          lastRunAt: T0,
          lastResult: "pong",
          status: "done",
          createdAt: T0,
        },
      ])
    ).toBe(
      [
        "  [ab12cd34] alpha | @daily (every 1440 minutes) | scheduled",
        "      Prompt: summarize the inbox",
        "      Next: 2026-03-02 10:00:00Z",
        "",
        "  [ef56ab78] beta | once:+5m (once at 2026-03-01T10:00:00.000Z) | done",
        "      Prompt: ping",
        "      Last: pong",
      ].join("\n")
    );
  });

  it("summarizes daemon status", () => {
    expect(
      formatStatus({
        pid: 4242,
        startedAt: T0,
        uptimeMs: 65_000,
        socketPath: "/tmp/burrow/run/burrow.sock",
        busyWorkspaces: ["alpha"],
        scheduler: {
          running: true,
          tickIntervalMs: 60_000,
          ticks: 3,
          lastTickAt: T0,
          nextTickAt: T0 + 60_000,
          lastReport: { startedAt: T0, due: 2, completed: 1, failed: 0, deferred: 1, skipped: 0 },
        },
        stats: { activeConnections: 1, requests: 7, errors: 1 },
      })
    ).toBe(
      [
        "Daemon: running (pid 4242)",
        "  Uptime: 1m 5s",
        "  Socket: /tmp/burrow/run/burrow.sock",
        "  Busy: alpha",
        "  Scheduler: running, every 1m 0s, 3 ticks",
        "  Last tick: 2026-03-01 10:00:00Z (2 due, 1 completed, 0 failed, 1 deferred)",
        "  Requests: 7 (1 errors, 1 open)",
      ].join("\n")
    );
  });

  it("lists tools with their state", () => {
    expect(
      formatTools([
        { name: "gh", description: "GitHub CLI", known: true, enabled: true, installed: false },
        { name: "jq", description: "JSON processor", known: true, enabled: false, installed: true },
      ])
    ).toBe("  gh  enabled, not installed    GitHub CLI\n  jq  disabled, installed       JSON processor");
  });
});
