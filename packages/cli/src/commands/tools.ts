import { listInstalledTools, summarizeTools } from "@burrow/sandbox";
import { Command } from "commander";
import { loadCliContext } from "../utils/context";
import { formatTools } from "../utils/output";
import { writeStdout } from "../utils/terminal";

export function toolsCommand(): Command {
  return new Command("tools").description("Inspect sandbox tools").addCommand(
    new Command("list").description("List known, configured and installed tools").action(async () => {
      const { config, paths } = await loadCliContext();
      const installed = await listInstalledTools(paths.toolsDir);
      writeStdout(formatTools(summarizeTools(config.tools, installed)));
      writeStdout(`\nTools directory: ${paths.toolsDir}`);
    })
  );
}
