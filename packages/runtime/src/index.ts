export {
  AgentInvoker,
  STDERR_TAIL_CHARS,
  interpretAgentOutput,
  type AgentInvokerOptions,
  type AgentRunner,
  type InvocationRequest,
  type InvocationResult,
} from "./agentInvoker";
export {
  ConversationService,
  type ConversationOrigin,
  type ConversationServiceOptions,
  type ConversationStore,
  type ConversationTurn,
  type SendOptions,
  type WorkspaceSessionInfo,
} from "./conversationService";
export { runProcess, type ProcessRequest, type ProcessResult, type ProcessRunner } from "./processRunner";
export {
  Scheduler,
  type SchedulerOptions,
  type SchedulerStatus,
  type SchedulerStore,
  type TaskOutcome,
  type TickReport,
} from "./scheduler";
export { TranscriptWriter, transcriptPath, type TranscriptEntry, type TranscriptWriterOptions } from "./transcript";
export {
  WorkspaceLockManager,
  type LockPolicy,
  type ReleaseLock,
  type WorkspaceLockManagerOptions,
} from "./workspaceLock";
