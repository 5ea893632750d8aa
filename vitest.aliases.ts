import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

function pkg(relative: string): string {
  return path.resolve(root, "packages", relative);
}

// Subpaths must precede their parent packages.
export const aliases = [
  { find: "@burrow/telemetry/logging", replacement: pkg("telemetry/src/logging/index.ts") },
  { find: "@burrow/telemetry", replacement: pkg("telemetry/src/index.ts") },
  { find: "@burrow/core", replacement: pkg("core/src/index.ts") },
  { find: "@burrow/store", replacement: pkg("store/src/index.ts") },
  { find: "@burrow/sandbox", replacement: pkg("sandbox/src/index.ts") },
  { find: "@burrow/runtime", replacement: pkg("runtime/src/index.ts") },
  { find: "@burrow/daemon", replacement: pkg("daemon/src/index.ts") },
];
