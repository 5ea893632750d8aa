import type { Interface } from "node:readline";
import { toErrorPayload } from "@burrow/core";
import type { DaemonClient } from "@burrow/daemon";

/** What the REPL needs from the daemon, bound to one workspace. */
export interface ReplBackend {
  send(prompt: string): Promise<string>;
  reset(): Promise<boolean>;
  describe(): Promise<{ sessionId: string | null; transcriptPath: string }>;
}

export interface ReplLoopOptions {
  backend: ReplBackend;
  /** Resolves with the next line, or null once input is closed */
  ask: () => Promise<string | null>;
  write: (text: string) => void;
}

const EXIT_COMMANDS = new Set(["exit", "/exit", "/quit"]);
const HELP_COMMANDS = new Set(["/help", "/?"]);

const HELP_TEXT = [
  "Commands:",
  "  /new     start a new conversation",
  "  /status  show the current session",
  "  /exit    quit (Ctrl+D works too)",
].join("\n");

export function daemonBackend(client: DaemonClient, workspace: string): ReplBackend {
  return {
    send: async (prompt) => (await client.request({ command: "send-message", workspace, prompt })).reply,
    reset: async () => (await client.request({ command: "clear-session", workspace })).cleared,
    describe: () => client.request({ command: "start-interactive-session", workspace }),
  };
}

export function createAsk(rl: Interface, prompt = "> "): () => Promise<string | null> {
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  return () =>
    new Promise((resolve) => {
      if (closed) {
        resolve(null);
        return;
      }
      const onClose = () => resolve(null);
      rl.once("close", onClose);
      rl.question(prompt, (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    });
}

/** Reads prompts until the user quits; daemon errors are printed, not thrown. */
export async function runReplLoop(options: ReplLoopOptions): Promise<void> {
  const { backend, ask, write } = options;

  for (;;) {
    const line = await ask();
    if (line === null) {
      write("\nGoodbye!");
      return;
    }
    const input = line.trim();
    if (!input) {
      continue;
    }
    if (EXIT_COMMANDS.has(input.toLowerCase())) {
      write("Goodbye!");
      return;
    }
    if (HELP_COMMANDS.has(input)) {
      write(HELP_TEXT);
      continue;
    }

    try {
      if (input === "/new") {
        write((await backend.reset()) ? "Session cleared.\n" : "No active session.\n");
      } else if (input === "/status") {
        const info = await backend.describe();
        write(`Session: ${info.sessionId ?? "none"}\nTranscript: ${info.transcriptPath}\n`);
      } else {
        write(`\n${await backend.send(input)}\n`);
      }
    } catch (error) {
      const payload = toErrorPayload(error);
      write(`Error [${payload.code}]: ${payload.message}\n`);
    }
  }
}
