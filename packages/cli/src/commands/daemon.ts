import { BurrowDaemon } from "@burrow/daemon";
import { createSubsystemLogger } from "@burrow/telemetry";
import { Command } from "commander";
import { loadCliContext } from "../utils/context";
import { writeStdout } from "../utils/terminal";

export function daemonCommand(): Command {
  return new Command("daemon")
    .description("Run the daemon in the foreground")
    .action(async () => {
      const { config, paths } = await loadCliContext();
      const logger = createSubsystemLogger("cli", "daemon");
      const daemon = new BurrowDaemon({ config, paths });

      await daemon.start();
      writeStdout(`Burrow daemon listening on ${paths.socketPath}`);

      await new Promise<void>((resolve, reject) => {
        const shutdown = (signal: NodeJS.Signals) => {
          logger.info("Shutdown requested", { signal });
          process.off("SIGINT", shutdown);
          process.off("SIGTERM", shutdown);
          daemon.stop().then(resolve, reject);
        };
        process.on("SIGINT", shutdown);
        process.on("SIGTERM", shutdown);
      });
    });
}
