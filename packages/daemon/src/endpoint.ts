import { existsSync } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { EndpointInUseError } from "@burrow/core";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import { DaemonClient } from "./client";

export const PROBE_TIMEOUT_MS = 1000;

export interface EndpointPaths {
  socketPath: string;
  pidFile: string;
}

export interface AcquireEndpointOptions extends EndpointPaths {
  probeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Makes the socket path ready to bind. A socket that still answers belongs to
 * a live daemon and is left alone; one that does not is a leftover from a
 * daemon that died, and is removed along with its pid file.
 */
export async function acquireEndpoint(options: AcquireEndpointOptions): Promise<void> {
  const logger = options.logger ?? createSubsystemLogger("daemon", "endpoint");
  await mkdir(path.dirname(options.socketPath), { recursive: true, mode: 0o700 });

  if (!existsSync(options.socketPath)) {
    return;
  }

  const probe = new DaemonClient({
    socketPath: options.socketPath,
    timeoutMs: options.probeTimeoutMs ?? PROBE_TIMEOUT_MS,
  });
  if (await probe.isAlive()) {
    throw new EndpointInUseError(options.socketPath);
  }

  logger.warn("Removing stale daemon endpoint", { socketPath: options.socketPath });
  await releaseEndpoint(options);
}

export async function writePidFile(pidFile: string, pid: number = process.pid): Promise<void> {
  await writeFile(pidFile, `${pid}\n`, { mode: 0o600 });
}

export async function releaseEndpoint(paths: EndpointPaths): Promise<void> {
  await rm(paths.socketPath, { force: true });
  await rm(paths.pidFile, { force: true });
}
