import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { SandboxToolSettings } from "./types";

export interface ToolCredentialLoadResult {
  env: Record<string, string>;
  warnings: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** Needs CA certificates inside the sandbox when network is shared */
  requiresTls: boolean;
  /** Reads the tool's credential from the daemon's tool config directory */
  loadCredentials?: (toolConfigDir: string) => Promise<ToolCredentialLoadResult>;
}

export const TOOL_REGISTRY: ReadonlyMap<string, ToolDefinition> = new Map(
  [
    {
      name: "gh",
      description: "GitHub CLI",
      requiresTls: true,
      loadCredentials: loadGhCredentials,
    },
    { name: "jq", description: "JSON processor", requiresTls: false },
    { name: "yq", description: "YAML processor", requiresTls: false },
    { name: "rg", description: "ripgrep search", requiresTls: false },
    { name: "fd", description: "file finder", requiresTls: false },
    { name: "fzf", description: "fuzzy finder", requiresTls: false },
  ].map((tool): [string, ToolDefinition] => [tool.name, tool])
);

export function getToolDefinition(name: string): ToolDefinition | undefined {
  return TOOL_REGISTRY.get(name);
}

export interface ToolSelection {
  enabled: ToolDefinition[];
  unknown: string[];
}

/** Splits configured tools into known enabled ones and unknown names; disabled ones drop out. */
export function selectTools(tools: Readonly<Record<string, SandboxToolSettings>>): ToolSelection {
  const selection: ToolSelection = { enabled: [], unknown: [] };
  for (const name of Object.keys(tools).sort()) {
    const definition = TOOL_REGISTRY.get(name);
    if (!definition) {
      selection.unknown.push(name);
    } else if (tools[name].enabled) {
      selection.enabled.push(definition);
    }
  }
  return selection;
}

/** Credential variables for every enabled tool that declares a loader, keyed by tool name. */
export async function loadToolCredentials(
  tools: Readonly<Record<string, SandboxToolSettings>>,
  toolConfigDir: string
): Promise<{ credentials: Record<string, Record<string, string>>; warnings: string[] }> {
  const credentials: Record<string, Record<string, string>> = {};
  const warnings: string[] = [];

  for (const tool of selectTools(tools).enabled) {
    if (!tool.loadCredentials) {
      continue;
    }
    const loaded = await tool.loadCredentials(toolConfigDir);
    warnings.push(...loaded.warnings);
    if (Object.keys(loaded.env).length > 0) {
      credentials[tool.name] = loaded.env;
    }
  }

  return { credentials, warnings };
}

/** Executables present in the tools directory, sorted by name. */
export async function listInstalledTools(toolsDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(toolsDir);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }

  const installed: string[] = [];
  for (const entry of entries) {
    const info = await stat(path.join(toolsDir, entry));
    if (info.isFile() && (info.mode & 0o111) !== 0) {
      installed.push(entry);
    }
  }
  return installed.sort();
}

export interface ToolStatus {
  name: string;
  description: string;
  known: boolean;
  enabled: boolean;
  installed: boolean;
}

export function summarizeTools(
  tools: Readonly<Record<string, SandboxToolSettings>>,
  installed: readonly string[]
): ToolStatus[] {
  const names = new Set([...TOOL_REGISTRY.keys(), ...Object.keys(tools)]);
  return [...names].sort().map((name) => {
    const definition = TOOL_REGISTRY.get(name);
    return {
      name,
      description: definition?.description ?? "unknown tool",
      known: definition !== undefined,
      enabled: tools[name]?.enabled ?? false,
      installed: installed.includes(name),
    };
  });
}

async function loadGhCredentials(toolConfigDir: string): Promise<ToolCredentialLoadResult> {
  const hostsFile = path.join(toolConfigDir, "gh", "hosts.yml");
  let content: string;
  try {
    content = await readFile(hostsFile, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return { env: {}, warnings: [] };
    }
    throw error;
  }

  let hosts: unknown;
  try {
    hosts = parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { env: {}, warnings: [`Ignoring unreadable ${hostsFile}: ${reason}`] };
  }

  const token = findOauthToken(hosts);
  return token ? { env: { GH_TOKEN: token }, warnings: [] } : { env: {}, warnings: [] };
}

function findOauthToken(hosts: unknown): string | undefined {
  if (!isRecord(hosts)) {
    return undefined;
  }
  for (const entry of Object.values(hosts)) {
    if (isRecord(entry) && typeof entry.oauth_token === "string" && entry.oauth_token.length > 0) {
      return entry.oauth_token;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
