/**
 * Sandbox plan types.
 *
 * A plan is the complete, ordered description of one agent invocation's view
 * of the filesystem and environment. It is data only; `renderHelperArgs`
 * turns it into arguments for the namespace helper.
 */

export type MountAccess = "ro" | "rw";

export type SandboxMount =
  | { type: "bind"; source: string; target: string; access: MountAccess; optional?: boolean }
  | { type: "tmpfs"; target: string }
  | { type: "dir"; target: string }
  | { type: "proc"; target: string }
  | { type: "dev"; target: string }
  | { type: "symlink"; linkTarget: string; target: string };

export interface SandboxPlan {
  workspace: string;
  /** Host path of the workspace, bound read-write at `workdir` */
  workspaceRoot: string;
  workdir: string;
  /** Host path of the daemon-owned agent settings directory */
  agentConfigDir: string;
  /** Where `agentConfigDir` appears inside the sandbox */
  agentConfigTarget: string;
  mounts: SandboxMount[];
  env: Record<string, string>;
  shareNetwork: boolean;
  /** Enabled tools exposed on `PATH` */
  tools: string[];
  warnings: string[];
}

export interface SandboxToolSettings {
  enabled: boolean;
}

export interface SandboxPlanInput {
  workspace: { name: string; root: string };
  paths: {
    workspacesDir: string;
    agentConfigDir: string;
    toolsDir: string;
  };
  hostHome: string;
  user: string;
  hostEnv: NodeJS.ProcessEnv;
  passEnv: readonly string[];
  agent: {
    binaryPaths?: readonly string[];
    configTarget?: string;
  };
  tools: Readonly<Record<string, SandboxToolSettings>>;
  /** Credential variables per tool, as loaded by `loadToolCredentials` */
  toolCredentials?: Readonly<Record<string, Readonly<Record<string, string>>>>;
  shareNetwork: boolean;
  requireTls: boolean;
  pathExists: (target: string) => boolean;
}
