import { WorkspaceBusyError } from "@burrow/core";

/** `queue` waits its turn (within the depth bound); `reject` gives up at once when held. */
export type LockPolicy = "queue" | "reject";

export type ReleaseLock = () => void;

export interface WorkspaceLockManagerOptions {
  /** Callers allowed to wait behind the holder of one workspace (default: 4) */
  maxQueueDepth?: number;
}

interface LockState {
  held: boolean;
  waiters: Array<() => void>;
}

/**
 * One FIFO mutex per workspace name. Locks for different workspaces are
 * independent, so distinct workspaces run in parallel.
 */
export class WorkspaceLockManager {
  private readonly maxQueueDepth: number;
  private readonly locks = new Map<string, LockState>();

  constructor(options: WorkspaceLockManagerOptions = {}) {
    this.maxQueueDepth = options.maxQueueDepth ?? 4;
  }

  /**
   * Resolves with a release function once the caller holds the workspace.
   * Rejects with `WorkspaceBusyError` when the policy or the queue bound
   * forbids waiting.
   */
  acquire(workspace: string, policy: LockPolicy = "queue"): Promise<ReleaseLock> {
    const state = this.stateFor(workspace);

    if (!state.held) {
      state.held = true;
      return Promise.resolve(this.releaser(workspace, state));
    }
    if (policy === "reject" || state.waiters.length >= this.maxQueueDepth) {
      return Promise.reject(new WorkspaceBusyError(workspace));
    }

    return new Promise((resolve) => {
      state.waiters.push(() => resolve(this.releaser(workspace, state)));
    });
  }

  /** Runs `operation` while holding the workspace. */
  async withLock<T>(workspace: string, policy: LockPolicy, operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire(workspace, policy);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  isBusy(workspace: string): boolean {
    return this.locks.get(workspace)?.held ?? false;
  }

  queueDepth(workspace: string): number {
    return this.locks.get(workspace)?.waiters.length ?? 0;
  }

  busyWorkspaces(): string[] {
    return [...this.locks.entries()]
      .filter(([, state]) => state.held)
      .map(([name]) => name)
      .sort();
  }

  private stateFor(workspace: string): LockState {
    let state = this.locks.get(workspace);
    if (!state) {
      state = { held: false, waiters: [] };
      this.locks.set(workspace, state);
    }
    return state;
  }

  private releaser(workspace: string, state: LockState): ReleaseLock {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = state.waiters.shift();
      if (next) {
        next();
        return;
      }
      state.held = false;
      this.locks.delete(workspace);
    };
  }
}
