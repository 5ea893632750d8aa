import { describeTrigger } from "@burrow/core";
import type { DaemonResults } from "@burrow/daemon";
import type { ToolStatus } from "@burrow/sandbox";

type WorkspaceRow = DaemonResults["list-workspaces"]["workspaces"][number];
type TaskRow = DaemonResults["list-tasks"]["tasks"][number];
type DaemonStatus = DaemonResults["daemon-status"];

const PREVIEW_CHARS = 60;

export function truncate(text: string, max: number = PREVIEW_CHARS): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace("T", " ").replace(/\.\d{3}Z$/, "Z");
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

export function formatWorkspaces(workspaces: WorkspaceRow[]): string {
  if (workspaces.length === 0) {
    return "No workspaces yet.";
  }
  const width = Math.max(...workspaces.map((workspace) => workspace.name.length));
  return workspaces
    .map((workspace) => {
      const session = workspace.hasSession ? "active" : "none";
      return `  ${workspace.name.padEnd(width)}  session=${session}  tasks=${workspace.taskCount}`;
    })
    .join("\n");
}

export function formatTasks(tasks: TaskRow[]): string {
  if (tasks.length === 0) {
    return "No scheduled tasks.";
  }
  const blocks = tasks.map((task) => {
    const lines = [
      `  [${task.id}] ${task.workspace} | ${task.schedule} (${describeTrigger(task.trigger)}) | ${task.status}`,
      `      Prompt: ${truncate(task.prompt)}`,
    ];
    if (task.nextRunAt !== null) {
      lines.push(`      Next: ${formatTimestamp(task.nextRunAt)}`);
    }
    if (task.lastResult !== null) {
      lines.push(`      Last: ${truncate(task.lastResult)}`);
    }
    return lines.join("\n");
  });
  return blocks.join("\n\n");
}

export function formatStatus(status: DaemonStatus): string {
  const { scheduler, stats } = status;
  const lines = [
    `Daemon: running (pid ${status.pid})`,
    `  Uptime: ${formatDuration(status.uptimeMs)}`,
    `  Socket: ${status.socketPath}`,
    `  Busy: ${status.busyWorkspaces.length > 0 ? status.busyWorkspaces.join(", ") : "none"}`,
    `  Scheduler: ${scheduler.running ? "running" : "stopped"}, every ${formatDuration(scheduler.tickIntervalMs)}, ${scheduler.ticks} ticks`,
  ];
  if (scheduler.lastReport) {
    const report = scheduler.lastReport;
    lines.push(
      `  Last tick: ${formatTimestamp(report.startedAt)} (${report.due} due, ${report.completed} completed, ${report.failed} failed, ${report.deferred} deferred)`
    );
  }
  lines.push(`  Requests: ${stats.requests} (${stats.errors} errors, ${stats.activeConnections} open)`);
  return lines.join("\n");
}

export function formatTools(tools: ToolStatus[]): string {
  if (tools.length === 0) {
    return "No tools configured.";
  }
  const width = Math.max(...tools.map((tool) => tool.name.length));
  return tools
    .map((tool) => {
      const state = [tool.enabled ? "enabled" : "disabled", tool.installed ? "installed" : "not installed"];
      return `  ${tool.name.padEnd(width)}  ${state.join(", ").padEnd(24)}  ${tool.description}`;
    })
    .join("\n");
}
