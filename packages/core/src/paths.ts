import os from "node:os";
import path from "node:path";

const DEFAULT_DIR = ".burrow";

export interface BurrowPaths {
  home: string;
  configFile: string;
  dataDir: string;
  databaseFile: string;
  workspacesDir: string;
  /** Agent settings owned by the daemon, never the user's own */
  agentConfigDir: string;
  toolsDir: string;
  /** Credential stores for sandbox tools, read on the host only */
  toolConfigDir: string;
  runDir: string;
  socketPath: string;
  pidFile: string;
}

export function resolveBurrowHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.BURROW_HOME?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), DEFAULT_DIR);
}

export function resolveBurrowPaths(home: string = resolveBurrowHome()): BurrowPaths {
  const root = path.resolve(home);
  const dataDir = path.join(root, "data");
  const runDir = path.join(root, "run");
  return {
    home: root,
    configFile: path.join(root, "config.json"),
    dataDir,
    databaseFile: path.join(dataDir, "burrow.db"),
    workspacesDir: path.join(root, "workspaces"),
    agentConfigDir: path.join(root, "agent-config"),
    toolsDir: path.join(root, "tools"),
    toolConfigDir: path.join(root, "config"),
    runDir,
    socketPath: path.join(runDir, "burrow.sock"),
    pidFile: path.join(runDir, "burrow.pid"),
  };
}

/** Files every workspace directory holds. */
export const WORKSPACE_LAYOUT = {
  memoryFile: "MEMORY.md",
  transcriptFile: "transcript.log",
  stateDir: ".agent-state",
} as const;
