import { createInterface } from "node:readline";
import { DEFAULT_WORKSPACE } from "@burrow/core";
import { Command } from "commander";
import { connectClient } from "../utils/context";
import { createAsk, daemonBackend, runReplLoop } from "../utils/repl";
import { writeStdout } from "../utils/terminal";

export function replCommand(): Command {
  return new Command("repl")
    .description("Chat with a workspace interactively")
    .option("-g, --group <name>", "Workspace name", DEFAULT_WORKSPACE)
    .action(async (options: { group: string }) => {
      const client = await connectClient();
      const session = await client.request({ command: "start-interactive-session", workspace: options.group });

      writeStdout(`Burrow - chatting in workspace '${session.workspace}'`);
      writeStdout(session.hasSession ? "Resuming the previous conversation." : "Starting a new conversation.");
      writeStdout("Type /exit or Ctrl+D to quit, /help for commands.\n");

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        await runReplLoop({
          backend: daemonBackend(client, session.workspace),
          ask: createAsk(rl),
          write: writeStdout,
        });
      } finally {
        rl.close();
      }
    });
}
