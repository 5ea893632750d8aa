/**
 * Task Scheduler
 *
 * Single cooperative loop that fires due tasks through the conversation
 * service. A task is claimed in the store before its prompt is sent, so a
 * crash mid-firing never fires it twice.
 */

import { type Task, WorkspaceBusyError, toErrorPayload } from "@burrow/core";
import type { SqliteBurrowStore } from "@burrow/store";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import type { ConversationService } from "./conversationService";

export type SchedulerStore = Pick<SqliteBurrowStore, "dueTasks" | "claimTask" | "completeTask" | "deferTask">;

export type TaskOutcome = "completed" | "failed" | "deferred" | "skipped";

export interface TickReport {
  startedAt: number;
  due: number;
  completed: number;
  failed: number;
  deferred: number;
  skipped: number;
}

export interface SchedulerStatus {
  running: boolean;
  tickIntervalMs: number;
  ticks: number;
  lastTickAt: number | null;
  nextTickAt: number | null;
  lastReport: TickReport | null;
}

export interface SchedulerOptions {
  store: SchedulerStore;
  conversations: Pick<ConversationService, "send">;
  /** Delay between the end of one tick and the start of the next (default: 60000ms) */
  tickIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class Scheduler {
  private readonly store: SchedulerStore;
  private readonly conversations: Pick<ConversationService, "send">;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  /** Set by stop(); a tick in progress fires nothing further once it is set. */
  private halted = false;
  private inFlight: Promise<TickReport> | null = null;
  private ticks = 0;
  private lastTickAt: number | null = null;
  private nextTickAt: number | null = null;
  private lastReport: TickReport | null = null;

  constructor(options: SchedulerOptions) {
    this.store = options.store;
    this.conversations = options.conversations;
    this.tickIntervalMs = options.tickIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSubsystemLogger("runtime", "scheduler");
  }

  /** Starts the loop; the first tick runs right away to catch up on overdue tasks. */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.halted = false;
    this.logger.info("Scheduler started", { tickIntervalMs: this.tickIntervalMs });
    this.scheduleTick(0);
  }

  /**
   * Stops the loop and waits for a tick in progress. Firings already running
   * complete; tasks the tick has not reached stay due.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.halted = true;
    this.nextTickAt = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info("Scheduler stopped");
  }

  /** Runs one tick now, or joins the tick already in progress. */
  tick(now?: number): Promise<TickReport> {
    if (!this.inFlight) {
      this.inFlight = this.runTick(now ?? this.now()).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      tickIntervalMs: this.tickIntervalMs,
      ticks: this.ticks,
      lastTickAt: this.lastTickAt,
      nextTickAt: this.nextTickAt,
      lastReport: this.lastReport,
    };
  }

  private scheduleTick(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.nextTickAt = this.now() + delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick()
        .catch((error: unknown) => {
          this.logger.error("Scheduler tick failed", error);
        })
        .finally(() => {
          this.scheduleTick(this.tickIntervalMs);
        });
    }, delayMs);
  }

  private async runTick(now: number): Promise<TickReport> {
    const report: TickReport = { startedAt: now, due: 0, completed: 0, failed: 0, deferred: 0, skipped: 0 };
    this.ticks++;
    this.lastTickAt = now;

    const due = await this.store.dueTasks(now);
    report.due = due.length;

    // Tasks of one workspace fire in order; workspaces fire in parallel.
    const byWorkspace = new Map<string, Task[]>();
    for (const task of due) {
      const queue = byWorkspace.get(task.workspace) ?? [];
      queue.push(task);
      byWorkspace.set(task.workspace, queue);
    }

    await Promise.all(
      [...byWorkspace.values()].map(async (tasks) => {
        for (const task of tasks) {
          if (this.halted) {
            return;
          }
          report[await this.settle(task, now)]++;
        }
      })
    );

    if (report.due > 0) {
      this.logger.info("Scheduler tick finished", { ...report });
    }
    this.lastReport = report;
    return report;
  }

  /** Never rejects; a store failure counts as a failed firing. */
  private async settle(task: Task, now: number): Promise<TaskOutcome> {
    try {
      return await this.fire(task, now);
    } catch (error) {
      this.logger.forWorkspace(task.workspace).forTask(task.id).error("Task could not be settled", error);
      return "failed";
    }
  }

  private async fire(task: Task, now: number): Promise<TaskOutcome> {
    const log = this.logger.forWorkspace(task.workspace).forTask(task.id);
    const claimed = await this.store.claimTask(task.id, now);
    if (!claimed) {
      return "skipped";
    }

    log.info("Firing task", { schedule: task.schedule });
    try {
      const turn = await this.conversations.send(task.workspace, task.prompt, {
        origin: "scheduled",
        taskId: task.id,
      });
      const result = turn.result;
      await this.store.completeTask(task.id, {
        now: this.now(),
        result: result.ok ? result.reply : `[error ${result.error.code}] ${result.error.message}`,
      });
      if (!result.ok) {
        log.warn("Task failed", { code: result.error.code });
        return "failed";
      }
      return "completed";
    } catch (error) {
      if (error instanceof WorkspaceBusyError) {
        // Recurring tasks wait for their next trigger; one-shot tasks have not
        // fired yet and become due again on the next tick.
        const retryAt = claimed.nextRunAt ?? task.nextRunAt ?? now;
        await this.store.deferTask(task.id, retryAt);
        log.info("Workspace busy, task deferred", { retryAt });
        return "deferred";
      }
      const payload = toErrorPayload(error);
      log.error("Task errored", error);
      await this.store.completeTask(task.id, {
        now: this.now(),
        result: `[error ${payload.code}] ${payload.message}`,
      });
      return "failed";
    }
  }
}
