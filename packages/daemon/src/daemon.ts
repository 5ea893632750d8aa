/**
 * Burrow Daemon
 *
 * Hosts the control-plane server and the scheduler in one process. They share
 * the store and the per-workspace locks and coordinate through nothing else.
 */

import { type BurrowConfig, type BurrowPaths, BurrowError } from "@burrow/core";
import { AgentInvoker, type AgentRunner, ConversationService, Scheduler, WorkspaceLockManager } from "@burrow/runtime";
import { SqliteBurrowStore } from "@burrow/store";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import { ControlServer } from "./controlServer";
import { acquireEndpoint, releaseEndpoint, writePidFile } from "./endpoint";
import { createDaemonHandlers, dispatchRequest } from "./handlers";

export interface BurrowDaemonOptions {
  config: BurrowConfig;
  paths: BurrowPaths;
  /** Runs agent turns; defaults to the sandboxed `AgentInvoker` */
  invoker?: AgentRunner;
  now?: () => number;
  logger?: Logger;
}

interface RunningDaemon {
  store: SqliteBurrowStore;
  server: ControlServer;
  scheduler: Scheduler;
}

export class BurrowDaemon {
  private readonly config: BurrowConfig;
  private readonly paths: BurrowPaths;
  private readonly invoker: AgentRunner | undefined;
  private readonly now: () => number;
  private readonly logger: Logger;
  private running: RunningDaemon | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: BurrowDaemonOptions) {
    this.config = options.config;
    this.paths = options.paths;
    this.invoker = options.invoker;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSubsystemLogger("daemon");
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new BurrowError("INTERNAL", "Daemon already started");
    }
    const startedAt = this.now();
    const store = new SqliteBurrowStore({
      workspacesDir: this.paths.workspacesDir,
      databasePath: this.paths.databaseFile,
    });
    let listening: ControlServer | null = null;

    try {
      await acquireEndpoint({
        socketPath: this.paths.socketPath,
        pidFile: this.paths.pidFile,
        logger: this.logger,
      });

      // Only the endpoint owner may settle tasks a live daemon could be firing.
      const recovered = await store.recoverInterruptedTasks();
      if (recovered > 0) {
        this.logger.warn("Recovered tasks interrupted by a previous shutdown", { recovered });
      }

      const locks = new WorkspaceLockManager({ maxQueueDepth: this.config.maxQueueDepth });
      const conversations = new ConversationService({
        store,
        invoker: this.invoker ?? new AgentInvoker({ config: this.config, paths: this.paths }),
        locks,
        busyPolicy: this.config.busyPolicy,
        now: this.now,
      });
      const scheduler = new Scheduler({
        store,
        conversations,
        tickIntervalMs: this.config.tickIntervalMs,
        now: this.now,
      });

      const handlers = createDaemonHandlers({
        store,
        conversations,
        locks,
        scheduler,
        socketPath: this.paths.socketPath,
        startedAt,
        stats: () => server.getStats(),
        now: this.now,
      });
      const server = new ControlServer({
        socketPath: this.paths.socketPath,
        handle: (request) => dispatchRequest(handlers, request),
      });

      await server.listen();
      listening = server;
      await writePidFile(this.paths.pidFile);
      scheduler.start();
      this.running = { store, server, scheduler };
    } catch (error) {
      if (listening) {
        await listening.close();
        await releaseEndpoint(this.paths);
      }
      store.close();
      throw error;
    }

    this.logger.info("Daemon started", { socketPath: this.paths.socketPath, home: this.paths.home });
  }

  /** Safe to call more than once; later calls wait for the first. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const running = this.running;
    if (!running) {
      return;
    }
    this.logger.info("Daemon stopping");
    try {
      // No firing may start while open requests drain.
      await Promise.all([running.scheduler.stop(), running.server.close()]);
      await releaseEndpoint(this.paths);
    } finally {
      running.store.close();
      this.running = null;
    }
    this.logger.info("Daemon stopped");
  }
}
