import type { SandboxMount, SandboxPlan } from "./types";

/**
 * Renders a plan as `bwrap` arguments followed by `--` and the command.
 *
 * The environment is deliberately absent: the helper is spawned with exactly
 * `plan.env`, which keeps credentials out of process listings.
 */
export function renderHelperArgs(plan: SandboxPlan, command: readonly string[]): string[] {
  const args: string[] = [];
  for (const mount of plan.mounts) {
    args.push(...renderMount(mount));
  }
  args.push("--chdir", plan.workdir, "--unshare-all");
  if (plan.shareNetwork) {
    args.push("--share-net");
  }
  args.push("--die-with-parent", "--", ...command);
  return args;
}

function renderMount(mount: SandboxMount): string[] {
  switch (mount.type) {
    case "bind":
      if (mount.access === "rw") {
        return ["--bind", mount.source, mount.target];
      }
      return [mount.optional ? "--ro-bind-try" : "--ro-bind", mount.source, mount.target];
    case "tmpfs":
      return ["--tmpfs", mount.target];
    case "dir":
      return ["--dir", mount.target];
    case "proc":
      return ["--proc", mount.target];
    case "dev":
      return ["--dev", mount.target];
    case "symlink":
      return ["--symlink", mount.linkTarget, mount.target];
  }
}
