import { ValidationError } from "./errors";

export const DEFAULT_WORKSPACE = "default";

/** Lowercase letters, digits, `-` and `_`; no dots or separators, so no traversal. */
export const WORKSPACE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

export interface Workspace {
  name: string;
  root: string;
  createdAt: number;
}

export interface Session {
  workspace: string;
  sessionId: string;
  updatedAt: number;
}

export interface WorkspaceSummary extends Workspace {
  hasSession: boolean;
  sessionId: string | null;
  sessionUpdatedAt: number | null;
  taskCount: number;
}

export function isValidWorkspaceName(name: string): boolean {
  return WORKSPACE_NAME_PATTERN.test(name);
}

export function assertWorkspaceName(name: string): string {
  if (!isValidWorkspaceName(name)) {
    throw new ValidationError(
      "INVALID_WORKSPACE_NAME",
      `Invalid workspace name "${name}": use 1-64 lowercase letters, digits, "-" or "_"`
    );
  }
  return name;
}

export function resolveWorkspaceName(name: string | undefined): string {
  return assertWorkspaceName(name ?? DEFAULT_WORKSPACE);
}
