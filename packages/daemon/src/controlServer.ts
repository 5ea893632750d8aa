import { chmod } from "node:fs/promises";
import net from "node:net";
import { EndpointInUseError, toErrorPayload } from "@burrow/core";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import {
  type DaemonRequest,
  MAX_REQUEST_BYTES,
  type ServerStats,
  decodeRequest,
  encodeError,
  encodeResult,
} from "./protocol";

export type RequestHandler = (request: DaemonRequest) => Promise<unknown>;

export interface ControlServerOptions {
  socketPath: string;
  handle: RequestHandler;
  logger?: Logger;
}

/**
 * Unix-socket server for the control plane. Every connection carries one
 * request; connections are handled concurrently and independently.
 */
export class ControlServer {
  private readonly socketPath: string;
  private readonly handle: RequestHandler;
  private readonly logger: Logger;
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private readonly inFlight = new Set<Promise<void>>();
  private listening = false;
  private closing = false;
  private requests = 0;
  private errors = 0;

  constructor(options: ControlServerOptions) {
    this.socketPath = options.socketPath;
    this.handle = options.handle;
    this.logger = options.logger ?? createSubsystemLogger("daemon", "ipc");
    this.server = net.createServer((socket) => this.handleConnection(socket));
  }

  listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        reject(error.code === "EADDRINUSE" ? new EndpointInUseError(this.socketPath) : error);
      };
      this.server.once("error", onError);
      this.server.listen(this.socketPath, () => {
        this.server.off("error", onError);
        this.server.on("error", (error: Error) => {
          this.logger.error("Control server error", error);
        });
        this.listening = true;
        this.logger.info("Listening", { socketPath: this.socketPath });
        chmod(this.socketPath, 0o600).then(resolve, reject);
      });
    });
  }

  /**
   * Stops accepting connections and resolves once every request already
   * received has been answered.
   */
  async close(): Promise<void> {
    if (!this.listening) {
      return;
    }
    this.listening = false;
    this.closing = true;

    const closed = new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    await Promise.all([...this.inFlight]);
    // Connections that never sent a request would hold the server open.
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await closed;
    this.logger.info("Stopped listening", { socketPath: this.socketPath });
  }

  getStats(): ServerStats {
    return {
      activeConnections: this.sockets.size,
      requests: this.requests,
      errors: this.errors,
    };
  }

  private handleConnection(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.setEncoding("utf8");

    let buffer = "";
    let bytes = 0;
    let answered = false;

    const answer = (line: string) => {
      answered = true;
      const work = this.process(line).then((response) => {
        if (!socket.destroyed) {
          socket.end(response);
        }
      });
      this.inFlight.add(work);
      void work.finally(() => this.inFlight.delete(work));
    };

    socket.on("data", (chunk: string) => {
      if (answered) {
        return;
      }
      buffer += chunk;
      bytes += Buffer.byteLength(chunk, "utf8");

      const newline = buffer.indexOf("\n");
      if (newline !== -1) {
        answer(buffer.slice(0, newline));
        return;
      }
      if (bytes > MAX_REQUEST_BYTES) {
        answered = true;
        this.requests++;
        this.errors++;
        socket.end(encodeError({ code: "INVALID_REQUEST", message: `Request exceeds ${MAX_REQUEST_BYTES} bytes` }));
      }
    });

    socket.on("end", () => {
      if (answered) {
        return;
      }
      if (buffer.trim()) {
        answer(buffer);
      } else {
        socket.end();
      }
    });

    socket.on("error", (error: Error) => {
      this.logger.debug("Client connection error", { error: error.message });
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
    });
  }

  private async process(line: string): Promise<string> {
    this.requests++;
    if (this.closing) {
      this.errors++;
      return encodeError({ code: "SHUTTING_DOWN", message: "Daemon is shutting down" });
    }

    let command: string | undefined;
    try {
      const request = decodeRequest(line);
      command = request.command;
      const result = await this.handle(request);
      return encodeResult(result);
    } catch (error) {
      this.errors++;
      const payload = toErrorPayload(error);
      if (payload.code === "INTERNAL") {
        this.logger.error("Request failed", error, { command });
      } else {
        this.logger.debug("Request rejected", { command, code: payload.code });
      }
      return encodeError(payload);
    }
  }
}
