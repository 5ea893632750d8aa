import { mkdir, writeFile, appendFile } from "node:fs/promises";
import path from "node:path";
import { WORKSPACE_LAYOUT } from "@burrow/core";

export const MEMORY_HEADING = "# Memory\n\nNotes the agent keeps across conversations in this workspace.\n";

/**
 * Creates the workspace directory and its fixed layout. Safe to call on every
 * use: existing files are left as they are.
 */
export async function provisionWorkspace(root: string): Promise<void> {
  await mkdir(path.join(root, WORKSPACE_LAYOUT.stateDir), { recursive: true });
  await appendFile(path.join(root, WORKSPACE_LAYOUT.transcriptFile), "");

  try {
    await writeFile(path.join(root, WORKSPACE_LAYOUT.memoryFile), MEMORY_HEADING, { flag: "wx" });
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
      throw error;
    }
  }
}
