import { DEFAULT_WORKSPACE, ValidationError } from "@burrow/core";
import { Command } from "commander";
import { connectClient, joinPrompt } from "../utils/context";
import { readStdin, writeStdout } from "../utils/terminal";

export function sendCommand(): Command {
  return new Command("send")
    .description("Send a message to a workspace and print the reply")
    .option("-g, --group <name>", "Workspace name", DEFAULT_WORKSPACE)
    .argument("[prompt...]", "Message to send (read from stdin when omitted)")
    .action(async (words: string[], options: { group: string }) => {
      const prompt = joinPrompt(words, words.length > 0 ? "" : await readStdin());
      if (!prompt) {
        throw new ValidationError("INVALID_REQUEST", "No prompt provided");
      }
      const client = await connectClient();
      const result = await client.request({ command: "send-message", workspace: options.group, prompt });
      writeStdout(result.reply);
    });
}

export function newCommand(): Command {
  return new Command("new")
    .description("Start a new conversation in a workspace (clears its session)")
    .option("-g, --group <name>", "Workspace name", DEFAULT_WORKSPACE)
    .action(async (options: { group: string }) => {
      const client = await connectClient();
      const result = await client.request({ command: "clear-session", workspace: options.group });
      writeStdout(
        result.cleared
          ? `Session cleared for ${result.workspace}.`
          : `No active session in ${result.workspace}.`
      );
    });
}
