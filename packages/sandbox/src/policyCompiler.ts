/**
 * Sandbox Policy Compiler
 *
 * Builds the minimal-privilege view of the host for one agent invocation:
 * read-only system directories, the agent binary, a daemon-owned agent
 * settings directory and exactly one writable workspace.
 */

import os from "node:os";
import path from "node:path";
import { SandboxPolicyError, WORKSPACE_LAYOUT } from "@burrow/core";
import { personalAgentConfigDir } from "./agentConfig";
import { selectTools } from "./tools";
import type { SandboxMount, SandboxPlan, SandboxPlanInput } from "./types";

export const SANDBOX_WORKDIR = "/workspace";

const SYSTEM_PATH = ["/usr/local/bin", "/usr/bin", "/bin"];
const TLS_DIRECTORIES = ["/etc/ssl", "/etc/pki"];

export function defaultAgentBinaryPaths(hostHome: string = os.homedir()): string[] {
  return [path.join(hostHome, ".local", "bin"), path.join(hostHome, ".local", "share", "claude")];
}

export function compileSandboxPlan(input: SandboxPlanInput): SandboxPlan {
  const workspaceRoot = path.resolve(input.workspace.root);
  if (!input.pathExists(workspaceRoot)) {
    throw new SandboxPolicyError(
      "WORKSPACE_MISSING",
      `Workspace ${input.workspace.name} has no directory at ${workspaceRoot}`
    );
  }

  const hostHome = path.resolve(input.hostHome);
  const agentConfigDir = path.resolve(input.paths.agentConfigDir);
  const agentConfigTarget = input.agent.configTarget ?? personalAgentConfigDir(hostHome);
  const binaryPaths = input.agent.binaryPaths ?? defaultAgentBinaryPaths(hostHome);
  const warnings: string[] = [];

  const selection = selectTools(input.tools);
  for (const name of selection.unknown) {
    warnings.push(`Unknown tool "${name}" ignored`);
  }
  const tools = selection.enabled.map((tool) => tool.name);

  const mounts: SandboxMount[] = [
    { type: "bind", source: "/usr", target: "/usr", access: "ro" },
    { type: "bind", source: "/bin", target: "/bin", access: "ro" },
    { type: "bind", source: "/lib", target: "/lib", access: "ro" },
    { type: "bind", source: "/lib64", target: "/lib64", access: "ro", optional: true },
    { type: "symlink", linkTarget: "/usr/bin", target: "/sbin" },
    { type: "bind", source: "/etc/resolv.conf", target: "/etc/resolv.conf", access: "ro", optional: true },
    { type: "proc", target: "/proc" },
    { type: "dev", target: "/dev" },
    { type: "tmpfs", target: "/tmp" },
    { type: "tmpfs", target: "/home" },
    { type: "dir", target: hostHome },
  ];

  for (const binaryPath of binaryPaths) {
    const resolved = path.resolve(binaryPath);
    mounts.push({ type: "bind", source: resolved, target: resolved, access: "ro", optional: true });
  }

  mounts.push({ type: "bind", source: agentConfigDir, target: agentConfigTarget, access: "rw" });
  mounts.push({ type: "bind", source: workspaceRoot, target: SANDBOX_WORKDIR, access: "rw" });

  const toolsDir = path.resolve(input.paths.toolsDir);
  if (tools.length > 0) {
    mounts.push({ type: "bind", source: toolsDir, target: toolsDir, access: "ro" });
  }

  const needsTls =
    input.shareNetwork && (input.requireTls || selection.enabled.some((tool) => tool.requiresTls));
  if (needsTls) {
    for (const directory of TLS_DIRECTORIES) {
      mounts.push({ type: "bind", source: directory, target: directory, access: "ro", optional: true });
    }
  }

  const searchPath = [
    ...(tools.length > 0 ? [toolsDir] : []),
    ...binaryPaths.map((binaryPath) => path.resolve(binaryPath)),
    ...SYSTEM_PATH,
  ];

  const env: Record<string, string> = {
    HOME: hostHome,
    USER: input.user,
    PATH: searchPath.join(":"),
    BURROW_WORKSPACE: input.workspace.name,
    BURROW_STATE_DIR: path.posix.join(SANDBOX_WORKDIR, WORKSPACE_LAYOUT.stateDir),
  };

  for (const key of input.passEnv) {
    const value = input.hostEnv[key];
    if (value && !(key in env)) {
      env[key] = value;
    }
  }

  for (const tool of tools) {
    const credentials = input.toolCredentials?.[tool];
    if (credentials) {
      Object.assign(env, credentials);
    }
  }

  const plan: SandboxPlan = {
    workspace: input.workspace.name,
    workspaceRoot,
    workdir: SANDBOX_WORKDIR,
    agentConfigDir,
    agentConfigTarget,
    mounts,
    env,
    shareNetwork: input.shareNetwork,
    tools,
    warnings,
  };

  assertPlanInvariants(plan, { workspacesDir: input.paths.workspacesDir, hostHome });
  return plan;
}

export interface PlanInvariantContext {
  workspacesDir: string;
  hostHome: string;
}

/**
 * Throws `SANDBOX_POLICY` when a plan could expose another workspace, the
 * user's home or the user's own agent settings, or grants write access
 * beyond its workspace and the agent settings directory.
 */
export function assertPlanInvariants(plan: SandboxPlan, context: PlanInvariantContext): void {
  const workspacesDir = path.resolve(context.workspacesDir);
  const hostHome = path.resolve(context.hostHome);
  const personalConfig = personalAgentConfigDir(hostHome);

  if (path.dirname(plan.workspaceRoot) !== workspacesDir) {
    throw violation(`workspace root ${plan.workspaceRoot} is not directly inside ${workspacesDir}`);
  }

  let workspaceMounts = 0;
  for (const mount of plan.mounts) {
    if (mount.type !== "bind") {
      continue;
    }
    const source = path.resolve(mount.source);

    if (containsOrEquals(source, hostHome)) {
      throw violation(`mount of ${source} exposes the home directory`);
    }
    if (containsOrEquals(source, personalConfig) || containsOrEquals(personalConfig, source)) {
      throw violation(`mount of ${source} exposes the user's agent settings`);
    }
    // Read-only counts too: no other workspace may be visible at all.
    if (containsOrEquals(source, workspacesDir)) {
      throw violation(`mount of ${source} covers every workspace`);
    }
    if (containsOrEquals(workspacesDir, source) && !containsOrEquals(plan.workspaceRoot, source)) {
      throw violation(`mount of ${source} exposes another workspace`);
    }

    if (mount.access !== "rw") {
      continue;
    }
    if (source === plan.workspaceRoot && mount.target === plan.workdir) {
      workspaceMounts++;
    } else if (source !== plan.agentConfigDir) {
      throw violation(`unexpected writable mount of ${source}`);
    }
  }

  if (workspaceMounts !== 1) {
    throw violation(`expected exactly one workspace mount, found ${workspaceMounts}`);
  }
}

/** True when `parent` is `child` or one of its ancestors. */
function containsOrEquals(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

function violation(detail: string): SandboxPolicyError {
  return new SandboxPolicyError("SANDBOX_POLICY", `Sandbox policy violation: ${detail}`);
}
