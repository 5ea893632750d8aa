#!/usr/bin/env tsx
import { toErrorPayload } from "@burrow/core";
import { Command } from "commander";
import { daemonCommand } from "./commands/daemon";
import { replCommand } from "./commands/repl";
import { newCommand, sendCommand } from "./commands/send";
import { groupsCommand, statusCommand } from "./commands/status";
import { taskCommand } from "./commands/task";
import { toolsCommand } from "./commands/tools";
import { writeStderr } from "./utils/terminal";

const program = new Command();

program.name("burrow").description("Sandboxed coding-agent daemon").version("0.1.0");

program.addCommand(daemonCommand());
program.addCommand(sendCommand());
program.addCommand(replCommand());
program.addCommand(groupsCommand());
program.addCommand(statusCommand());
program.addCommand(newCommand());
program.addCommand(taskCommand());
program.addCommand(toolsCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  const { code, message } = toErrorPayload(error);
  writeStderr(`Error [${code}]: ${message}`);
  process.exit(1);
});
