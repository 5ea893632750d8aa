import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import path from "node:path";
import {
  type NewTaskInput,
  NotFoundError,
  type Session,
  StoreError,
  TASK_RESULT_MAX_CHARS,
  type Task,
  type TaskStatus,
  type Trigger,
  ValidationError,
  type Workspace,
  type WorkspaceSummary,
  assertWorkspaceName,
  firstRunAt,
  isBurrowError,
  nextRunAfterFire,
  parseTrigger,
} from "@burrow/core";
import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";
import { provisionWorkspace } from "./provision";

export interface SqliteBurrowStoreConfig {
  /** Directory under which every workspace root is created */
  workspacesDir: string;
  databasePath?: string;
  database?: DatabaseInstance;
  generateTaskId?: () => string;
}

export interface CompleteTaskInput {
  now: number;
  result: string;
}

interface WorkspaceRow {
  name: string;
  root: string;
  created_at: number;
  session_id: string | null;
  session_updated_at: number | null;
}

interface WorkspaceSummaryRow extends WorkspaceRow {
  task_count: number;
}

interface TaskRow {
  id: string;
  workspace: string;
  schedule: string;
  trigger_kind: Trigger["kind"];
  interval_minutes: number | null;
  once_at: number | null;
  prompt: string;
  next_run_at: number | null;
  last_run_at: number | null;
  last_result: string | null;
  status: TaskStatus;
  created_at: number;
}

const TASK_ID_LENGTH = 8;
const MAX_ID_ATTEMPTS = 16;

/**
 * Durable state for workspaces, sessions and scheduled tasks.
 *
 * One instance is shared by the daemon and the scheduler. better-sqlite3 calls
 * are synchronous, so every method body runs to completion on the event loop
 * without interleaving; multi-statement updates still go through
 * `db.transaction` so a crash never leaves them half applied.
 */
export class SqliteBurrowStore {
  private readonly db: DatabaseInstance;
  private readonly workspacesDir: string;
  private readonly generateTaskId: () => string;

  constructor(config: SqliteBurrowStoreConfig) {
    this.workspacesDir = path.resolve(config.workspacesDir);
    this.generateTaskId = config.generateTaskId ?? defaultTaskId;
    this.db = openDatabase(config);
    try {
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("foreign_keys = ON");
      this.initSchema();
    } catch (error) {
      throw new StoreError(`Failed to open store: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getOrCreateWorkspace(name: string, now: number = Date.now()): Promise<Workspace> {
    assertWorkspaceName(name);
    const root = path.join(this.workspacesDir, name);

    try {
      await provisionWorkspace(root);
    } catch (error) {
      throw new StoreError(`Failed to provision workspace ${name}: ${errorMessage(error)}`, { cause: error });
    }

    return this.guard(() => {
      this.db
        .prepare("INSERT OR IGNORE INTO workspaces (name, root, created_at) VALUES (?, ?, ?)")
        .run(name, root, now);
      const row = this.db.prepare("SELECT * FROM workspaces WHERE name = ?").get(name) as
        | WorkspaceRow
        | undefined;
      if (!row) {
        throw new StoreError(`Workspace ${name} vanished after insert`);
      }
      return mapWorkspace(row);
    });
  }

  async getWorkspace(name: string): Promise<Workspace | null> {
    const row = this.guard(
      () =>
        this.db.prepare("SELECT * FROM workspaces WHERE name = ?").get(name) as WorkspaceRow | undefined
    );
    return row ? mapWorkspace(row) : null;
  }

  async getSession(name: string): Promise<Session | null> {
    const row = this.guard(
      () =>
        this.db.prepare("SELECT * FROM workspaces WHERE name = ?").get(name) as WorkspaceRow | undefined
    );
    if (!row || row.session_id === null) {
      return null;
    }
    return {
      workspace: row.name,
      sessionId: row.session_id,
      updatedAt: row.session_updated_at ?? row.created_at,
    };
  }

  async setSession(name: string, sessionId: string, now: number = Date.now()): Promise<Session> {
    if (sessionId.length === 0) {
      throw new ValidationError("INVALID_REQUEST", "Session id must not be empty");
    }
    const changes = this.guard(
      () =>
        this.db
          .prepare("UPDATE workspaces SET session_id = ?, session_updated_at = ? WHERE name = ?")
          .run(sessionId, now, name).changes
    );
    if (changes === 0) {
      throw new NotFoundError(`Workspace ${name} not found`);
    }
    return { workspace: name, sessionId, updatedAt: now };
  }

  /** Resolves to `false` when there was no session to clear. */
  async clearSession(name: string): Promise<boolean> {
    const changes = this.guard(
      () =>
        this.db
          .prepare(
            "UPDATE workspaces SET session_id = NULL, session_updated_at = NULL WHERE name = ? AND session_id IS NOT NULL"
          )
          .run(name).changes
    );
    return changes > 0;
  }

  async listWorkspaces(): Promise<WorkspaceSummary[]> {
    const rows = this.guard(
      () =>
        this.db
          .prepare(`
            SELECT w.*, (
              SELECT COUNT(*) FROM tasks t WHERE t.workspace = w.name AND t.status != 'done'
            ) AS task_count
            FROM workspaces w
            ORDER BY w.name ASC
          `)
          .all() as WorkspaceSummaryRow[]
    );
    return rows.map((row) => ({
      ...mapWorkspace(row),
      hasSession: row.session_id !== null,
      sessionId: row.session_id,
      sessionUpdatedAt: row.session_updated_at,
      taskCount: row.task_count,
    }));
  }

  async addTask(input: NewTaskInput, now: number = Date.now()): Promise<Task> {
    assertWorkspaceName(input.workspace);
    const trigger = parseTrigger(input.schedule, now);
    const prompt = input.prompt.trim();
    if (prompt.length === 0) {
      throw new ValidationError("INVALID_REQUEST", "Task prompt must not be empty");
    }

    await this.getOrCreateWorkspace(input.workspace, now);

    return this.guard(() => {
      const id = this.nextTaskId();
      this.db
        .prepare(`
          INSERT INTO tasks (
            id,
            workspace,
            schedule,
            trigger_kind,
            interval_minutes,
            once_at,
            prompt,
            next_run_at,
            status,
            created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'scheduled', ?)
        `)
        .run(
          id,
          input.workspace,
          input.schedule.trim(),
          trigger.kind,
          trigger.kind === "interval" ? trigger.minutes : null,
          trigger.kind === "once" ? trigger.at : null,
          prompt,
          firstRunAt(trigger, now),
          now
        );
      return this.requireTask(id);
    });
  }

  async listTasks(workspace?: string): Promise<Task[]> {
    const rows = this.guard(() =>
      workspace === undefined
        ? (this.db.prepare("SELECT * FROM tasks ORDER BY created_at ASC, rowid ASC").all() as TaskRow[])
        : (this.db
            .prepare("SELECT * FROM tasks WHERE workspace = ? ORDER BY created_at ASC, rowid ASC")
            .all(workspace) as TaskRow[])
    );
    return rows.map(mapTask);
  }

  async getTask(id: string): Promise<Task | null> {
    const row = this.guard(
      () => this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined
    );
    return row ? mapTask(row) : null;
  }

  async deleteTask(id: string): Promise<boolean> {
    const changes = this.guard(() => this.db.prepare("DELETE FROM tasks WHERE id = ?").run(id).changes);
    return changes > 0;
  }

  async dueTasks(now: number): Promise<Task[]> {
    const rows = this.guard(
      () =>
        this.db
          .prepare(`
            SELECT * FROM tasks
            WHERE status = 'scheduled' AND next_run_at IS NOT NULL AND next_run_at <= ?
            ORDER BY next_run_at ASC, created_at ASC
          `)
          .all(now) as TaskRow[]
    );
    return rows.map(mapTask);
  }

  /**
   * Marks a due task as firing and moves its next run past this firing before
   * anything is invoked. Resolves to `null` when the task is gone, not due, or
   * already claimed.
   */
  async claimTask(id: string, now: number): Promise<Task | null> {
    return this.guard(() =>
      this.db.transaction((): Task | null => {
        const row = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined;
        if (!row || row.status !== "scheduled" || row.next_run_at === null || row.next_run_at > now) {
          return null;
        }
        const next = nextRunAfterFire(triggerOf(row), now);
        this.db
          .prepare("UPDATE tasks SET status = 'firing', next_run_at = ? WHERE id = ?")
          .run(next, id);
        return this.requireTask(id);
      })()
    );
  }

  async completeTask(id: string, input: CompleteTaskInput): Promise<Task | null> {
    return this.guard(() =>
      this.db.transaction((): Task | null => {
        const row = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined;
        if (!row) {
          return null;
        }
        const status: TaskStatus = row.trigger_kind === "interval" ? "scheduled" : "done";
        this.db
          .prepare(`
            UPDATE tasks
            SET status = ?, last_run_at = ?, last_result = ?, next_run_at = ?
            WHERE id = ?
          `)
          .run(
            status,
            input.now,
            input.result.slice(0, TASK_RESULT_MAX_CHARS),
            status === "done" ? null : row.next_run_at,
            id
          );
        return this.requireTask(id);
      })()
    );
  }

  /** Puts a claimed task back in the schedule without recording a run. */
  async deferTask(id: string, nextRunAt: number): Promise<boolean> {
    const changes = this.guard(
      () =>
        this.db
          .prepare("UPDATE tasks SET status = 'scheduled', next_run_at = ? WHERE id = ? AND status != 'done'")
          .run(nextRunAt, id).changes
    );
    return changes > 0;
  }

  /**
   * Settles tasks a previous daemon left in `firing`. One-shot tasks may already
   * have run, so they are retired; recurring tasks already had their next run
   * advanced when claimed and simply go back to the schedule.
   */
  async recoverInterruptedTasks(): Promise<number> {
    return this.guard(() =>
      this.db.transaction((): number => {
        const retired = this.db
          .prepare(`
            UPDATE tasks
            SET status = 'done', next_run_at = NULL, last_result = 'Interrupted by daemon restart'
            WHERE status = 'firing' AND trigger_kind = 'once'
          `)
          .run().changes;
        const rescheduled = this.db
          .prepare("UPDATE tasks SET status = 'scheduled' WHERE status = 'firing' AND trigger_kind = 'interval'")
          .run().changes;
        return retired + rescheduled;
      })()
    );
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private nextTaskId(): string {
    const exists = this.db.prepare("SELECT 1 FROM tasks WHERE id = ?");
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateTaskId();
      if (!exists.get(id)) {
        return id;
      }
    }
    throw new StoreError("Could not allocate a unique task id");
  }

  private requireTask(id: string): Task {
    const row = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined;
    if (!row) {
      throw new StoreError(`Task ${id} vanished during update`);
    }
    return mapTask(row);
  }

  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (isBurrowError(error)) {
        throw error;
      }
      throw new StoreError(`Store operation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workspaces (
        name TEXT PRIMARY KEY,
        root TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        session_id TEXT,
        session_updated_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        workspace TEXT NOT NULL REFERENCES workspaces(name),
        schedule TEXT NOT NULL,
        trigger_kind TEXT NOT NULL,
        interval_minutes INTEGER,
        once_at INTEGER,
        prompt TEXT NOT NULL,
        next_run_at INTEGER,
        last_run_at INTEGER,
        last_result TEXT,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_due
        ON tasks(status, next_run_at);

      CREATE INDEX IF NOT EXISTS idx_tasks_workspace
        ON tasks(workspace);
    `);
  }
}

function openDatabase(config: SqliteBurrowStoreConfig): DatabaseInstance {
  if (config.database) {
    return config.database;
  }
  const databasePath = config.databasePath ?? ":memory:";
  try {
    if (databasePath !== ":memory:") {
      mkdirSync(path.dirname(databasePath), { recursive: true });
    }
    return new Database(databasePath);
  } catch (error) {
    throw new StoreError(`Failed to open store at ${databasePath}: ${errorMessage(error)}`, { cause: error });
  }
}

function defaultTaskId(): string {
  return randomUUID().replace(/-/g, "").slice(0, TASK_ID_LENGTH);
}

function triggerOf(row: TaskRow): Trigger {
  if (row.trigger_kind === "interval") {
    return { kind: "interval", minutes: row.interval_minutes ?? 0 };
  }
  return { kind: "once", at: row.once_at ?? row.created_at };
}

function mapWorkspace(row: WorkspaceRow): Workspace {
  return {
    name: row.name,
    root: row.root,
    createdAt: row.created_at,
  };
}

function mapTask(row: TaskRow): Task {
  return {
    id: row.id,
    workspace: row.workspace,
    schedule: row.schedule,
    trigger: triggerOf(row),
    prompt: row.prompt,
    nextRunAt: row.next_run_at,
    lastRunAt: row.last_run_at,
    lastResult: row.last_result,
    status: row.status,
    createdAt: row.created_at,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
