export * from "./types";
export {
  AGENT_CONFIG_DIRNAME,
  AGENT_CREDENTIALS_FILE,
  personalAgentConfigDir,
  prepareAgentConfigDir,
} from "./agentConfig";
export { renderHelperArgs } from "./helperArgs";
export {
  SANDBOX_WORKDIR,
  assertPlanInvariants,
  compileSandboxPlan,
  defaultAgentBinaryPaths,
  type PlanInvariantContext,
} from "./policyCompiler";
export {
  TOOL_REGISTRY,
  getToolDefinition,
  listInstalledTools,
  loadToolCredentials,
  selectTools,
  summarizeTools,
  type ToolCredentialLoadResult,
  type ToolDefinition,
  type ToolSelection,
  type ToolStatus,
} from "./tools";
