import { type BurrowPaths, type LoadedConfig, loadBurrowConfig } from "@burrow/core";
import { DaemonClient } from "@burrow/daemon";
import { configureLogger, createConsoleTransport } from "@burrow/telemetry";

/** Loads configuration and points the global logger at it. */
export async function loadCliContext(): Promise<LoadedConfig> {
  const loaded = await loadBurrowConfig();
  configureLogger({
    level: loaded.config.logLevel,
    transports: [createConsoleTransport({ pretty: loaded.config.logFormat === "pretty" })],
  });
  return loaded;
}

export async function connectClient(): Promise<DaemonClient> {
  const { paths } = await loadCliContext();
  return createClient(paths);
}

export function createClient(paths: BurrowPaths): DaemonClient {
  return new DaemonClient({ socketPath: paths.socketPath });
}

/** Prompt words from the command line, or piped stdin when there are none. */
export function joinPrompt(words: string[], piped: string): string {
  const fromArgs = words.join(" ").trim();
  return fromArgs || piped.trim();
}
