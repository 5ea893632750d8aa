import { constants } from "node:fs";
import { copyFile, mkdir } from "node:fs/promises";
import path from "node:path";

export const AGENT_CONFIG_DIRNAME = ".claude";
export const AGENT_CREDENTIALS_FILE = ".credentials.json";

/** The user's own agent settings directory; never exposed to the sandbox. */
export function personalAgentConfigDir(hostHome: string): string {
  return path.join(hostHome, AGENT_CONFIG_DIRNAME);
}

/**
 * Ensures the daemon-owned agent settings directory exists. On first use the
 * user's login credentials are copied in so the agent can authenticate; the
 * user's plugins and settings stay behind.
 *
 * @returns whether credentials were copied
 */
export async function prepareAgentConfigDir(agentConfigDir: string, hostHome: string): Promise<boolean> {
  await mkdir(agentConfigDir, { recursive: true, mode: 0o700 });
  const source = path.join(personalAgentConfigDir(hostHome), AGENT_CREDENTIALS_FILE);
  const target = path.join(agentConfigDir, AGENT_CREDENTIALS_FILE);
  try {
    await copyFile(source, target, constants.COPYFILE_EXCL);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "EEXIST" || error.code === "ENOENT")) {
      return false;
    }
    throw error;
  }
}
