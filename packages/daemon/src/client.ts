import net from "node:net";
import { BurrowError, DaemonUnavailableError } from "@burrow/core";
import {
  type DaemonCommand,
  type DaemonRequestInputMap,
  DaemonResponseSchema,
  type DaemonResults,
  RESULT_SCHEMAS,
  encodeRequest,
} from "./protocol";

export interface DaemonClientOptions {
  socketPath: string;
  /** Gives up when no response arrives in time; unset waits for as long as the daemon takes. */
  timeoutMs?: number;
}

const UNREACHABLE_CODES = new Set(["ENOENT", "ECONNREFUSED", "ENOTSOCK"]);

/**
 * Talks to a running daemon: one connection per request.
 */
export class DaemonClient {
  private readonly socketPath: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: DaemonClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Sends a request and resolves with its validated result. Error responses
   * reject with a `BurrowError` carrying the daemon's code.
   */
  async request<K extends DaemonCommand>(
    request: DaemonRequestInputMap[K] & { command: K }
  ): Promise<DaemonResults[K]> {
    const command: K = request.command;
    const line = await this.exchange(encodeRequest(request));
    const response = parseResponse(line);
    if (response.status === "error") {
      throw new BurrowError(response.error.code, response.error.message);
    }
    const result = RESULT_SCHEMAS[command].safeParse(response.result);
    if (!result.success) {
      throw new BurrowError("INTERNAL", `Daemon sent an unexpected ${command} result`);
    }
    return result.data;
  }

  /** True when something answers on the socket, whatever it answers. */
  async isAlive(): Promise<boolean> {
    try {
      await this.exchange(encodeRequest({ command: "daemon-status" }));
      return true;
    } catch {
      return false;
    }
  }

  /** Writes one raw payload and resolves with the first response line. */
  exchange(payload: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ path: this.socketPath });
      let buffer = "";
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (error: Error | null, line?: string) => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        socket.destroy();
        if (error) {
          reject(error);
        } else {
          resolve(line ?? "");
        }
      };

      if (this.timeoutMs !== undefined) {
        const timeoutMs = this.timeoutMs;
        timer = setTimeout(() => {
          finish(new DaemonUnavailableError(`Daemon did not answer within ${timeoutMs}ms`));
        }, timeoutMs);
      }

      socket.setEncoding("utf8");
      socket.on("connect", () => {
        socket.write(payload);
      });
      socket.on("data", (chunk: string) => {
        buffer += chunk;
        const newline = buffer.indexOf("\n");
        if (newline !== -1) {
          finish(null, buffer.slice(0, newline));
        }
      });
      socket.on("end", () => {
        if (buffer.trim()) {
          finish(null, buffer);
        } else {
          finish(new DaemonUnavailableError("Daemon closed the connection without answering"));
        }
      });
      socket.on("error", (error: NodeJS.ErrnoException) => {
        finish(error.code && UNREACHABLE_CODES.has(error.code) ? new DaemonUnavailableError() : error);
      });
    });
  }
}

function parseResponse(line: string) {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new BurrowError("INTERNAL", "Daemon sent a response that is not JSON");
  }
  const parsed = DaemonResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BurrowError("INTERNAL", "Daemon sent a malformed response");
  }
  return parsed.data;
}
