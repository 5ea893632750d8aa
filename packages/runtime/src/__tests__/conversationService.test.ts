import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { WorkspaceBusyError } from "@burrow/core";
import { SqliteBurrowStore } from "@burrow/store";
import { createLogger, createMemoryTransport } from "@burrow/telemetry";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { InvocationResult } from "../agentInvoker";
import { ConversationService } from "../conversationService";
import { TranscriptWriter } from "../transcript";
import { WorkspaceLockManager } from "../workspaceLock";
import { type Deferred, ScriptedAgent, deferred, failed, ok } from "./fakes";

const T0 = Date.parse("2026-03-01T10:00:00Z");

describe("ConversationService", () => {
  let home: string;
  let store: SqliteBurrowStore;
  let agent: ScriptedAgent;
  let locks: WorkspaceLockManager;
  let service: ConversationService;

  beforeEach(async () => {
    home = await mkdtemp(path.join(os.tmpdir(), "burrow-conversation-"));
    store = new SqliteBurrowStore({ workspacesDir: path.join(home, "workspaces"), database: new Database(":memory:") });
    agent = new ScriptedAgent();
    locks = new WorkspaceLockManager();
    service = new ConversationService({
      store,
      invoker: agent,
      locks,
      transcripts: new TranscriptWriter({ utc: true }),
      now: () => T0,
    });
  });

  afterEach(async () => {
    store.close();
    await rm(home, { recursive: true, force: true });
  });

  function holdReplies(): Deferred<InvocationResult>[] {
    const pending: Deferred<InvocationResult>[] = [];
    agent.respondWith(() => {
      const reply = deferred<InvocationResult>();
      pending.push(reply);
      return reply.promise;
    });
    return pending;
  }

  it("carries the session from turn to turn and forgets it on reset", async () => {
    const first = await service.send("alpha", "hello", { origin: "interactive" });
    expect(first.result).toEqual(ok("reply 1", "session-1"));
    expect(first.workspace.name).toBe("alpha");
    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "session-1" });

    await service.send("alpha", "and then?", { origin: "interactive" });
    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "session-2" });

    expect(await service.reset("alpha")).toBe(true);
    await service.send("alpha", "start over", { origin: "interactive" });

    expect(agent.calls).toEqual([
      { workspace: "alpha", prompt: "hello", resumeSessionId: undefined },
      { workspace: "alpha", prompt: "and then?", resumeSessionId: "session-1" },
      { workspace: "alpha", prompt: "start over", resumeSessionId: undefined },
    ]);
    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "session-3" });
  });

  it("never changes the session when the agent fails", async () => {
    await service.send("alpha", "hello", { origin: "interactive" });
    agent.respondWith(() => failed("INVOCATION_TIMEOUT", "Agent timed out after 300000ms"));

    const turn = await service.send("alpha", "slow one", { origin: "interactive" });

    expect(turn.result.ok).toBe(false);
    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "session-1" });
  });

  it("appends each exchange to the transcript", async () => {
    await service.send("alpha", "hello", { origin: "interactive" });
    agent.respondWith(() => failed("INVOCATION_FAILED", "Agent exited with code 2"));
    await service.send("alpha", "report", { origin: "scheduled", taskId: "ab12cd34" });

    const transcript = await readFile(path.join(home, "workspaces", "alpha", "transcript.log"), "utf8");
    expect(transcript).toBe(
      "--- 2026-03-01 10:00:00 ---\n> hello\n\n" +
        "--- 2026-03-01 10:00:00 ---\nreply 1\n\n" +
        "--- 2026-03-01 10:00:00 ---\n> [task:ab12cd34] report\n\n" +
        "--- 2026-03-01 10:00:00 ---\n[error INVOCATION_FAILED] Agent exited with code 2\n\n"
    );
  });

  it("serializes turns of one workspace and reads the session inside the lock", async () => {
    const pending = holdReplies();

    const turns = [
      service.send("alpha", "one", { origin: "interactive" }),
      service.send("alpha", "two", { origin: "interactive" }),
      service.send("beta", "three", { origin: "interactive" }),
    ];

    await vi.waitFor(() => expect(agent.calls).toHaveLength(2));
    expect(agent.calls.map((call) => call.workspace).sort()).toEqual(["alpha", "beta"]);

    const firstAlpha = agent.calls.findIndex((call) => call.workspace === "alpha");
    const firstPrompt = agent.calls[firstAlpha].prompt;
    pending[firstAlpha].resolve(ok("a1", "alpha-1"));

    await vi.waitFor(() => expect(agent.calls).toHaveLength(3));
    expect(agent.calls[2]).toEqual({
      workspace: "alpha",
      prompt: firstPrompt === "one" ? "two" : "one",
      resumeSessionId: "alpha-1",
    });

    pending[1 - firstAlpha].resolve(ok("b1", "beta-1"));
    pending[2].resolve(ok("a2", "alpha-2"));
    await Promise.all(turns);

    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "alpha-2" });
    expect(await store.getSession("beta")).toMatchObject({ sessionId: "beta-1" });
  });

  it("turns scheduled work away from a busy workspace", async () => {
    const pending = holdReplies();
    const interactive = service.send("alpha", "long task", { origin: "interactive" });
    await vi.waitFor(() => expect(agent.calls).toHaveLength(1));

    await expect(service.send("alpha", "tick", { origin: "scheduled" })).rejects.toBeInstanceOf(WorkspaceBusyError);

    pending[0].resolve(ok("done", "s1"));
    await interactive;
    expect(agent.calls).toHaveLength(1);
  });

  it("validates before invoking", async () => {
    await expect(service.send("alpha", "   ", { origin: "interactive" })).rejects.toMatchObject({
      code: "INVALID_REQUEST",
    });
    await expect(service.send("Not/A/Name", "hi", { origin: "interactive" })).rejects.toMatchObject({
      code: "INVALID_WORKSPACE_NAME",
    });
    await expect(service.reset("../x")).rejects.toMatchObject({ code: "INVALID_WORKSPACE_NAME" });
    expect(agent.calls).toEqual([]);
  });

  it("describes a workspace for interactive sessions", async () => {
    const root = path.join(home, "workspaces", "alpha");

    expect(await service.openSession("alpha")).toEqual({
      workspace: "alpha",
      root,
      sessionId: null,
      hasSession: false,
      transcriptPath: path.join(root, "transcript.log"),
    });

    await service.send("alpha", "hello", { origin: "interactive" });
    expect(await service.openSession("alpha")).toMatchObject({ sessionId: "session-1", hasSession: true });
  });

  it("reports nothing to clear for a fresh workspace", async () => {
    expect(await service.reset("fresh")).toBe(false);
  });

  it("completes the turn when the transcript cannot be written", async () => {
    class FailingTranscript extends TranscriptWriter {
      override async append(): Promise<void> {
        throw new Error("disk full");
      }
    }
    const transport = createMemoryTransport();
    const unlogged = new ConversationService({
      store,
      invoker: agent,
      locks,
      transcripts: new FailingTranscript(),
      logger: createLogger({ name: "runtime:conversation", transports: [transport] }),
      now: () => T0,
    });

    const turn = await unlogged.send("alpha", "hello", { origin: "interactive" });

    expect(turn.result).toEqual(ok("reply 1", "session-1"));
    expect(await store.getSession("alpha")).toMatchObject({ sessionId: "session-1" });
    expect(locks.isBusy("alpha")).toBe(false);
    const [entry] = transport.getEntries("error");
    expect(entry).toMatchObject({
      message: "Transcript write failed",
      workspace: "alpha",
      error: { message: "disk full" },
    });
  });
});
