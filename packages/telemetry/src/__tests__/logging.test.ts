import {
  ConsoleTransport,
  type ILogTransport,
  type Logger,
  type MemoryTransport,
  configureLogger,
  createLogger,
  createMemoryTransport,
  createSubsystemLogger,
  getLogger,
  isLogLevel,
  resetLogger,
} from "@burrow/telemetry/logging";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("Logger", () => {
  let transport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    transport = createMemoryTransport();
    logger = createLogger({ name: "test", level: "trace", transports: [transport] });
  });

  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
  });

  it("emits every level at or above the threshold", () => {
    const quiet = createLogger({ name: "quiet", level: "warn", transports: [transport] });
    quiet.debug("hidden");
    quiet.info("hidden");
    quiet.warn("shown");
    quiet.fatal("also shown");

    expect(transport.messages()).toEqual(["shown", "also shown"]);
    expect(quiet.isLevelEnabled("error")).toBe(true);
    expect(quiet.isLevelEnabled("trace")).toBe(false);
  });

  it("filters stored entries by level", () => {
    logger.trace("t");
    logger.warn("w1");
    logger.info("i");
    logger.warn("w2");

    expect(transport.getEntries("warn").map((entry) => entry.message)).toEqual(["w1", "w2"]);
    expect(transport.getEntries()).toHaveLength(4);
  });

  it("attaches data and leaves out empty data", () => {
    logger.info("with data", { attempts: 2 });
    logger.info("without data", {});

    const [first, second] = transport.getEntries();
    expect(first).toMatchObject({ level: "info", logger: "test", message: "with data", data: { attempts: 2 } });
    expect(second.data).toBeUndefined();
  });

  it("describes errors with their string code", () => {
    logger.error("store failed", Object.assign(new Error("disk gone"), { code: "STORE_UNAVAILABLE" }));
    logger.error("exit failed", Object.assign(new Error("boom"), { code: 7 }));
    logger.error("odd failure", "plain string");

    const [coded, numeric, plain] = transport.getEntries("error");
    expect(coded.error).toMatchObject({ name: "Error", message: "disk gone", code: "STORE_UNAVAILABLE" });
    expect(numeric.error?.code).toBeUndefined();
    expect(plain.error).toEqual({ name: "Error", message: "plain string" });
  });

  it("scopes entries to a workspace and a task", () => {
    logger.forWorkspace("alpha").forTask("ab12cd34").info("firing");
    logger.named("daemon:ipc").info("listening");

    const [scoped, renamed] = transport.getEntries();
    expect(scoped).toMatchObject({ logger: "test", workspace: "alpha", taskId: "ab12cd34" });
    expect(renamed.logger).toBe("daemon:ipc");
    expect(renamed.workspace).toBeUndefined();
  });

  it("keeps logging when one transport throws", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    const broken: ILogTransport = {
      name: "broken",
      write() {
        throw new Error("pipe closed");
      },
    };
    createLogger({ name: "test", transports: [broken, transport] }).info("still here");

    expect(transport.messages()).toEqual(["still here"]);
    expect(stderr).toHaveBeenCalledWith('log transport "broken" failed: pipe closed\n');
  });

  it("routes subsystem loggers through the configured root logger", () => {
    configureLogger({ level: "debug", transports: [transport] });
    createSubsystemLogger("runtime", "scheduler").debug("tick");
    createSubsystemLogger("daemon").info("started");

    expect(transport.getEntries().map((entry) => entry.logger)).toEqual(["runtime:scheduler", "daemon"]);
  });

  it("creates the root logger lazily", () => {
    expect(getLogger().loggerName).toBe("burrow");
    expect(getLogger("store").loggerName).toBe("store");
  });

  it("recognises level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe("ConsoleTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats pretty lines", () => {
    const formatter = new ConsoleTransport({ colors: false, showTimestamp: false });
    const line = formatter.formatPretty({
      level: "warn",
      logger: "runtime:scheduler",
      message: "Task failed",
      time: "2026-03-01T10:00:00.000Z",
      workspace: "alpha",
      taskId: "ab12cd34",
      data: { code: "INVOCATION_TIMEOUT" },
    });

    expect(line).toBe('WARN  [runtime:scheduler] [ws:alpha] [task:ab12cd34] Task failed {"code":"INVOCATION_TIMEOUT"}');
  });

  it("appends the error below the line", () => {
    const formatter = new ConsoleTransport({ colors: false });
    const line = formatter.formatPretty({
      level: "error",
      logger: "daemon",
      message: "Request failed",
      time: "2026-03-01T10:00:00.000Z",
      error: { name: "StoreError", code: "STORE_UNAVAILABLE", message: "database is locked" },
    });

    expect(line).toBe("2026-03-01T10:00:00.000Z ERROR [daemon] Request failed\n  StoreError [STORE_UNAVAILABLE]: database is locked");
  });

  it("writes JSON lines to stderr", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    const entry = { level: "info" as const, logger: "cli", message: "hi", time: "2026-03-01T10:00:00.000Z" };

    new ConsoleTransport({ pretty: false }).write(entry);

    expect(stderr).toHaveBeenCalledWith(`${JSON.stringify(entry)}\n`);
  });
});
