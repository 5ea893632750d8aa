import { isBurrowError } from "@burrow/core";
import { Command } from "commander";
import { connectClient } from "../utils/context";
import { formatStatus, formatWorkspaces } from "../utils/output";
import { writeStdout } from "../utils/terminal";

export function statusCommand(): Command {
  return new Command("status").description("Show whether the daemon is running").action(async () => {
    const client = await connectClient();
    try {
      writeStdout(formatStatus(await client.request({ command: "daemon-status" })));
    } catch (error) {
      if (isBurrowError(error) && error.code === "DAEMON_NOT_RUNNING") {
        writeStdout("Daemon: not running\n  Start it with: burrow daemon");
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });
}

export function groupsCommand(): Command {
  return new Command("groups").description("List workspaces").action(async () => {
    const client = await connectClient();
    const { workspaces } = await client.request({ command: "list-workspaces" });
    writeStdout(formatWorkspaces(workspaces));
  });
}
