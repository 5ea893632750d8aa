import type { AgentRunner, InvocationRequest, InvocationResult } from "../agentInvoker";

export interface RecordedInvocation {
  workspace: string;
  prompt: string;
  resumeSessionId?: string;
}

type Reply = InvocationResult | Promise<InvocationResult>;

/**
 * Agent stand-in answering from a handler; records every call it receives.
 */
export class ScriptedAgent implements AgentRunner {
  readonly calls: RecordedInvocation[] = [];
  private handler: (request: InvocationRequest, index: number) => Reply;

  constructor(handler?: (request: InvocationRequest, index: number) => Reply) {
    this.handler = handler ?? ((_request, index) => ok(`reply ${index + 1}`, `session-${index + 1}`));
  }

  respondWith(handler: (request: InvocationRequest, index: number) => Reply): void {
    this.handler = handler;
  }

  async invoke(request: InvocationRequest): Promise<InvocationResult> {
    const index = this.calls.length;
    this.calls.push({
      workspace: request.workspace.name,
      prompt: request.prompt,
      resumeSessionId: request.resumeSessionId,
    });
    return this.handler(request, index);
  }
}

export function ok(reply: string, sessionId: string): InvocationResult {
  return { ok: true, reply, sessionId, durationMs: 5 };
}

export function failed(code: "INVOCATION_FAILED" | "INVOCATION_TIMEOUT", message: string): InvocationResult {
  return { ok: false, error: { code, message }, durationMs: 5 };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export const flush = () => new Promise((resolve) => setTimeout(resolve, 0));
