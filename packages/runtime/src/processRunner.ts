import { spawn } from "node:child_process";

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  /** The complete environment of the child; nothing is inherited */
  env: Record<string, string>;
  cwd?: string;
  input: string;
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires */
  killGraceMs: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Set when the process could not be started at all */
  spawnError?: Error;
}

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;

/**
 * Runs a child to completion with stdin fed from `input`. Never rejects:
 * spawn failures and timeouts are reported in the result.
 */
export const runProcess: ProcessRunner = (request) =>
  new Promise((resolve) => {
    const child = spawn(request.command, [...request.args], {
      env: request.env,
      cwd: request.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: Omit<ProcessResult, "stdout" | "stderr" | "timedOut">) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      clearTimeout(killTimer);
      resolve({ stdout, stderr, timedOut, ...result });
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        child.kill("SIGKILL");
      }, request.killGraceMs);
    }, request.timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      finish({ exitCode: null, signal: null, spawnError: error });
    });

    child.on("close", (code, signal) => {
      finish({ exitCode: code, signal });
    });

    // EPIPE means the child exited without reading its input; its exit status says why.
    child.stdin.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code !== "EPIPE") {
        stderr += `\n[stdin] ${error.message}`;
      }
    });
    child.stdin.end(request.input);
  });
