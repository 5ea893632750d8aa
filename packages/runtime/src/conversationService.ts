import {
  type InteractiveBusyPolicy,
  type ScheduledBusyPolicy,
  ValidationError,
  type Workspace,
  assertWorkspaceName,
} from "@burrow/core";
import type { SqliteBurrowStore } from "@burrow/store";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import type { AgentRunner, InvocationResult } from "./agentInvoker";
import { TranscriptWriter, transcriptPath } from "./transcript";
import type { LockPolicy, WorkspaceLockManager } from "./workspaceLock";

export type ConversationOrigin = "interactive" | "scheduled";

export interface SendOptions {
  origin: ConversationOrigin;
  /** Scheduled task the prompt comes from, recorded in the transcript */
  taskId?: string;
}

export interface ConversationTurn {
  workspace: Workspace;
  result: InvocationResult;
}

export interface WorkspaceSessionInfo {
  workspace: string;
  root: string;
  sessionId: string | null;
  hasSession: boolean;
  transcriptPath: string;
}

export type ConversationStore = Pick<
  SqliteBurrowStore,
  "getOrCreateWorkspace" | "getSession" | "setSession" | "clearSession"
>;

export interface ConversationServiceOptions {
  store: ConversationStore;
  invoker: AgentRunner;
  locks: WorkspaceLockManager;
  busyPolicy?: { interactive: InteractiveBusyPolicy; scheduled: ScheduledBusyPolicy };
  transcripts?: TranscriptWriter;
  now?: () => number;
  logger?: Logger;
}

/**
 * Owns the session discipline of a workspace: one invocation at a time, the
 * session read inside the lock, and the session replaced only by a
 * successful reply.
 */
export class ConversationService {
  private readonly store: ConversationStore;
  private readonly invoker: AgentRunner;
  private readonly locks: WorkspaceLockManager;
  private readonly policies: Record<ConversationOrigin, LockPolicy>;
  private readonly transcripts: TranscriptWriter;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: ConversationServiceOptions) {
    this.store = options.store;
    this.invoker = options.invoker;
    this.locks = options.locks;
    this.policies = {
      interactive: options.busyPolicy?.interactive ?? "queue",
      scheduled: options.busyPolicy?.scheduled ?? "reject",
    };
    this.transcripts = options.transcripts ?? new TranscriptWriter();
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSubsystemLogger("runtime", "conversation");
  }

  /**
   * Sends one prompt to a workspace's agent. Rejects with
   * `WorkspaceBusyError` when the workspace cannot be acquired under the
   * origin's policy; agent failures resolve with `result.ok === false`.
   */
  async send(workspaceName: string, prompt: string, options: SendOptions): Promise<ConversationTurn> {
    if (prompt.trim().length === 0) {
      throw new ValidationError("INVALID_REQUEST", "Prompt must not be empty");
    }
    const workspace = await this.store.getOrCreateWorkspace(workspaceName, this.now());
    const scoped = this.logger.forWorkspace(workspace.name);
    const log = options.taskId ? scoped.forTask(options.taskId) : scoped;

    const release = await this.locks.acquire(workspace.name, this.policies[options.origin]);
    try {
      const session = await this.store.getSession(workspace.name);
      const askedAt = this.now();
      log.debug("Sending prompt", { origin: options.origin, resume: session !== null });

      const result = await this.invoker.invoke({
        workspace,
        prompt,
        resumeSessionId: session?.sessionId,
      });
      const answeredAt = this.now();

      if (result.ok) {
        await this.store.setSession(workspace.name, result.sessionId, answeredAt);
      }

      // The session is already stored; a lost transcript entry must not fail the turn.
      try {
        await this.transcripts.append(
          workspace.root,
          { role: "user", at: askedAt, text: prompt, taskId: options.taskId },
          result.ok
            ? { role: "agent", at: answeredAt, text: result.reply }
            : { role: "agent", at: answeredAt, error: result.error }
        );
      } catch (error) {
        log.error("Transcript write failed", error);
      }

      return { workspace, result };
    } finally {
      release();
    }
  }

  /** Resolves a workspace for an interactive session, creating it on first use. */
  async openSession(workspaceName: string): Promise<WorkspaceSessionInfo> {
    const workspace = await this.store.getOrCreateWorkspace(workspaceName, this.now());
    const session = await this.store.getSession(workspace.name);
    return {
      workspace: workspace.name,
      root: workspace.root,
      sessionId: session?.sessionId ?? null,
      hasSession: session !== null,
      transcriptPath: transcriptPath(workspace.root),
    };
  }

  /**
   * Forgets the workspace's session so the next prompt starts fresh. Waits
   * for an invocation in progress so its session cannot resurface afterwards.
   */
  async reset(workspaceName: string): Promise<boolean> {
    const name = assertWorkspaceName(workspaceName);
    return this.locks.withLock(name, "queue", async () => {
      const cleared = await this.store.clearSession(name);
      this.logger.forWorkspace(name).info("Session cleared", { cleared });
      return cleared;
    });
  }
}
