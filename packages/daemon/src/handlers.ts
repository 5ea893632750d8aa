import { BurrowError, NotFoundError, assertWorkspaceName } from "@burrow/core";
import type { ConversationService, Scheduler, WorkspaceLockManager } from "@burrow/runtime";
import type { SqliteBurrowStore } from "@burrow/store";
import type { DaemonCommand, DaemonRequest, DaemonRequestMap, DaemonResults, ServerStats } from "./protocol";

export type DaemonHandlers = {
  [K in DaemonCommand]: (request: DaemonRequestMap[K]) => Promise<DaemonResults[K]>;
};

export type HandlerStore = Pick<SqliteBurrowStore, "listWorkspaces" | "addTask" | "listTasks" | "deleteTask">;

export interface HandlerContext {
  store: HandlerStore;
  conversations: Pick<ConversationService, "send" | "openSession" | "reset">;
  locks: Pick<WorkspaceLockManager, "busyWorkspaces">;
  scheduler: Pick<Scheduler, "getStatus">;
  socketPath: string;
  startedAt: number;
  stats: () => ServerStats;
  pid?: number;
  now?: () => number;
}

export function createDaemonHandlers(context: HandlerContext): DaemonHandlers {
  const now = context.now ?? Date.now;
  const pid = context.pid ?? process.pid;

  return {
    "send-message": async ({ workspace, prompt }) => {
      const turn = await context.conversations.send(workspace, prompt, { origin: "interactive" });
      if (!turn.result.ok) {
        throw new BurrowError(turn.result.error.code, turn.result.error.message);
      }
      return {
        workspace: turn.workspace.name,
        reply: turn.result.reply,
        sessionId: turn.result.sessionId,
        durationMs: turn.result.durationMs,
      };
    },

    "start-interactive-session": async ({ workspace }) => context.conversations.openSession(workspace),

    "list-workspaces": async () => ({ workspaces: await context.store.listWorkspaces() }),

    "clear-session": async ({ workspace }) => ({
      workspace,
      cleared: await context.conversations.reset(workspace),
    }),

    "daemon-status": async () => {
      const current = now();
      return {
        pid,
        startedAt: context.startedAt,
        uptimeMs: current - context.startedAt,
        socketPath: context.socketPath,
        busyWorkspaces: context.locks.busyWorkspaces(),
        scheduler: context.scheduler.getStatus(),
        stats: context.stats(),
      };
    },

    "add-task": async ({ workspace, schedule, prompt }) => ({
      task: await context.store.addTask({ workspace, schedule, prompt }, now()),
    }),

    "list-tasks": async ({ workspace }) => {
      const filter = workspace === undefined ? undefined : assertWorkspaceName(workspace);
      return { tasks: await context.store.listTasks(filter) };
    },

    "remove-task": async ({ taskId }) => {
      if (!(await context.store.deleteTask(taskId))) {
        throw new NotFoundError(`No task with id ${taskId}`);
      }
      return { taskId, removed: true };
    },
  };
}

function invoke<K extends DaemonCommand>(
  handlers: DaemonHandlers,
  command: K,
  request: DaemonRequestMap[K]
): Promise<DaemonResults[K]> {
  return handlers[command](request);
}

/** Routes a decoded request to the handler for its command. */
export function dispatchRequest(handlers: DaemonHandlers, request: DaemonRequest): Promise<unknown> {
  return invoke(handlers, request.command, request);
}
