/**
 * Agent Invoker
 *
 * Runs one agent turn inside the sandbox and turns whatever happened into an
 * `InvocationResult`. It never touches the store: session bookkeeping belongs
 * to the conversation service.
 */

import { existsSync } from "node:fs";
import os from "node:os";
import {
  type BurrowConfig,
  type BurrowPaths,
  type ErrorCode,
  type ErrorPayload,
  type InvocationErrorCode,
  type Workspace,
  isBurrowError,
} from "@burrow/core";
import {
  compileSandboxPlan,
  loadToolCredentials,
  prepareAgentConfigDir,
  renderHelperArgs,
} from "@burrow/sandbox";
import { type Logger, createSubsystemLogger } from "@burrow/telemetry";
import { z } from "zod";
import { type ProcessResult, type ProcessRunner, runProcess } from "./processRunner";

export const STDERR_TAIL_CHARS = 500;

const AgentOutputSchema = z.object({
  result: z.string().optional(),
  session_id: z.string().min(1),
  is_error: z.boolean().optional(),
});

export interface InvocationRequest {
  workspace: Workspace;
  prompt: string;
  resumeSessionId?: string;
}

export type InvocationResult =
  | { ok: true; reply: string; sessionId: string; durationMs: number }
  | { ok: false; error: ErrorPayload; durationMs: number };

/** Anything that can run an agent turn; the conversation service depends on this only. */
export interface AgentRunner {
  invoke(request: InvocationRequest): Promise<InvocationResult>;
}

export interface AgentInvokerOptions {
  config: BurrowConfig;
  paths: BurrowPaths;
  hostHome?: string;
  user?: string;
  hostEnv?: NodeJS.ProcessEnv;
  runProcess?: ProcessRunner;
  pathExists?: (target: string) => boolean;
  logger?: Logger;
}

export class AgentInvoker implements AgentRunner {
  private readonly config: BurrowConfig;
  private readonly paths: BurrowPaths;
  private readonly hostHome: string;
  private readonly user: string;
  private readonly hostEnv: NodeJS.ProcessEnv;
  private readonly run: ProcessRunner;
  private readonly pathExists: (target: string) => boolean;
  private readonly logger: Logger;

  constructor(options: AgentInvokerOptions) {
    this.config = options.config;
    this.paths = options.paths;
    this.hostHome = options.hostHome ?? os.homedir();
    this.user = options.user ?? os.userInfo().username;
    this.hostEnv = options.hostEnv ?? process.env;
    this.run = options.runProcess ?? runProcess;
    this.pathExists = options.pathExists ?? existsSync;
    this.logger = options.logger ?? createSubsystemLogger("runtime", "invoker");
  }

  /** The agent command line, without the sandbox helper around it. */
  buildAgentCommand(resumeSessionId?: string): string[] {
    const command = [this.config.agent.command, ...this.config.agent.args];
    if (resumeSessionId) {
      command.push(this.config.agent.resumeFlag, resumeSessionId);
    }
    return command;
  }

  async invoke(request: InvocationRequest): Promise<InvocationResult> {
    const startedAt = Date.now();
    const log = this.logger.forWorkspace(request.workspace.name);
    const fail = (code: ErrorCode, message: string): InvocationResult => ({
      ok: false,
      error: { code, message },
      durationMs: Date.now() - startedAt,
    });

    let helperArgs: string[];
    let env: Record<string, string>;
    try {
      await prepareAgentConfigDir(this.paths.agentConfigDir, this.hostHome);
      const { credentials, warnings: credentialWarnings } = await loadToolCredentials(
        this.config.tools,
        this.paths.toolConfigDir
      );
      const plan = compileSandboxPlan({
        workspace: request.workspace,
        paths: this.paths,
        hostHome: this.hostHome,
        user: this.user,
        hostEnv: this.hostEnv,
        passEnv: this.config.passEnv,
        agent: this.config.agent,
        tools: this.config.tools,
        toolCredentials: credentials,
        shareNetwork: this.config.sandbox.shareNetwork,
        requireTls: this.config.sandbox.requireTls,
        pathExists: this.pathExists,
      });
      for (const warning of [...credentialWarnings, ...plan.warnings]) {
        log.warn(warning);
      }
      helperArgs = renderHelperArgs(plan, this.buildAgentCommand(request.resumeSessionId));
      env = plan.env;
    } catch (error) {
      if (isBurrowError(error)) {
        log.error("Sandbox plan rejected", error);
        return fail(error.code, error.message);
      }
      throw error;
    }

    log.debug("Invoking agent", { resume: request.resumeSessionId !== undefined });
    const result = await this.run({
      command: this.config.sandbox.helper,
      args: helperArgs,
      env,
      input: request.prompt,
      timeoutMs: this.config.invocationTimeoutMs,
      killGraceMs: this.config.killGraceMs,
    });

    const outcome = interpretAgentOutput(result, this.config.invocationTimeoutMs, startedAt);
    if (outcome.ok) {
      log.info("Agent replied", { sessionId: outcome.sessionId, durationMs: outcome.durationMs });
    } else {
      log.warn("Agent invocation failed", { code: outcome.error.code, durationMs: outcome.durationMs });
    }
    return outcome;
  }
}

/** Maps a finished helper process onto an invocation outcome. */
export function interpretAgentOutput(
  result: ProcessResult,
  timeoutMs: number,
  startedAt: number,
  now: number = Date.now()
): InvocationResult {
  const durationMs = now - startedAt;
  const fail = (code: InvocationErrorCode, message: string): InvocationResult => ({
    ok: false,
    error: { code, message },
    durationMs,
  });

  if (result.spawnError) {
    return fail("SPAWN_FAILED", `Could not start sandbox: ${result.spawnError.message}`);
  }
  if (result.timedOut) {
    return fail("INVOCATION_TIMEOUT", `Agent timed out after ${timeoutMs}ms`);
  }
  if (result.exitCode !== 0) {
    const status = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.exitCode}`;
    const tail = result.stderr.trim().slice(-STDERR_TAIL_CHARS);
    return fail("INVOCATION_FAILED", tail ? `Agent exited with ${status}: ${tail}` : `Agent exited with ${status}`);
  }

  const parsed = AgentOutputSchema.safeParse(parseJson(result.stdout));
  if (!parsed.success) {
    return fail("MALFORMED_OUTPUT", "Agent output was not a JSON object with a session_id");
  }
  const reply = parsed.data.result ?? "";
  if (parsed.data.is_error) {
    return fail("INVOCATION_FAILED", reply || "Agent reported an error");
  }
  return { ok: true, reply, sessionId: parsed.data.session_id, durationMs };
}

function parseJson(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    // Some agent builds print diagnostics before the result line.
    const lastLine = trimmed.slice(trimmed.lastIndexOf("\n") + 1);
    try {
      return JSON.parse(lastLine);
    } catch {
      return undefined;
    }
  }
}
