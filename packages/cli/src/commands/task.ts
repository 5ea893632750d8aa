import { DEFAULT_WORKSPACE, SCHEDULE_HELP, ValidationError } from "@burrow/core";
import { Command } from "commander";
import { connectClient, joinPrompt } from "../utils/context";
import { formatTasks, formatTimestamp } from "../utils/output";
import { writeStdout } from "../utils/terminal";

export function taskCommand(): Command {
  return new Command("task")
    .description("Manage scheduled tasks")
    .addCommand(addCommand())
    .addCommand(listCommand())
    .addCommand(removeCommand());
}

function addCommand(): Command {
  return new Command("add")
    .description("Schedule a prompt")
    .option("-g, --group <name>", "Workspace name", DEFAULT_WORKSPACE)
    .requiredOption("-c, --cron <schedule>", SCHEDULE_HELP)
    .argument("<prompt...>", "Prompt to send when the task fires")
    .action(async (words: string[], options: { group: string; cron: string }) => {
      const prompt = joinPrompt(words, "");
      if (!prompt) {
        throw new ValidationError("INVALID_REQUEST", "No prompt provided");
      }
      const client = await connectClient();
      const { task } = await client.request({
        command: "add-task",
        workspace: options.group,
        schedule: options.cron,
        prompt,
      });
      const next = task.nextRunAt === null ? "never" : formatTimestamp(task.nextRunAt);
      writeStdout(`Task ${task.id} created. Next run: ${next}`);
    });
}

function listCommand(): Command {
  return new Command("list")
    .description("List scheduled tasks")
    .option("-g, --group <name>", "Only tasks of this workspace")
    .action(async (options: { group?: string }) => {
      const client = await connectClient();
      const { tasks } = await client.request({ command: "list-tasks", workspace: options.group });
      writeStdout(formatTasks(tasks));
    });
}

function removeCommand(): Command {
  return new Command("rm")
    .description("Remove a task")
    .argument("<taskId>", "Task ID to remove")
    .action(async (taskId: string) => {
      const client = await connectClient();
      await client.request({ command: "remove-task", taskId });
      writeStdout(`Task ${taskId} removed.`);
    });
}
