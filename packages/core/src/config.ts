import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ValidationError } from "./errors";
import { type BurrowPaths, resolveBurrowHome, resolveBurrowPaths } from "./paths";

/** Host variables the agent may see; anything else stays outside the sandbox. */
export const DEFAULT_PASS_ENV = [
  "ANTHROPIC_API_KEY",
  "ANTHROPIC_AUTH_TOKEN",
  "ANTHROPIC_BASE_URL",
  "ANTHROPIC_MODEL",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "NO_PROXY",
  "http_proxy",
  "https_proxy",
  "no_proxy",
  "TZ",
  "LANG",
] as const;

export const DEFAULT_AGENT_ARGS = ["-p", "--output-format", "json", "--dangerously-skip-permissions"];

const BusyPolicySchema = z.object({
  interactive: z.enum(["queue", "reject"]).default("queue"),
  scheduled: z.enum(["reject", "queue"]).default("reject"),
});

const AgentSchema = z.object({
  command: z.string().min(1).default("claude"),
  args: z.array(z.string()).default(DEFAULT_AGENT_ARGS),
  resumeFlag: z.string().min(1).default("--resume"),
  /** In-sandbox path of the agent's settings directory; defaults to `<home>/.claude` */
  configTarget: z.string().min(1).optional(),
  /** Host paths holding the agent binary and its assets, bound read-only */
  binaryPaths: z.array(z.string()).optional(),
});

const SandboxSchema = z.object({
  helper: z.string().min(1).default("bwrap"),
  shareNetwork: z.boolean().default(true),
  requireTls: z.boolean().default(true),
});

const ToolSettingsSchema = z.object({
  enabled: z.boolean().default(true),
});

export const BurrowConfigSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
  tickIntervalMs: z.number().int().min(100).default(60_000),
  invocationTimeoutMs: z.number().int().positive().default(300_000),
  killGraceMs: z.number().int().nonnegative().default(5_000),
  maxQueueDepth: z.number().int().nonnegative().default(4),
  busyPolicy: BusyPolicySchema.default({}),
  agent: AgentSchema.default({}),
  sandbox: SandboxSchema.default({}),
  tools: z.record(z.string(), ToolSettingsSchema).default({}),
  passEnv: z.array(z.string()).default([...DEFAULT_PASS_ENV]),
});

export type BurrowConfig = z.infer<typeof BurrowConfigSchema>;
export type InteractiveBusyPolicy = BurrowConfig["busyPolicy"]["interactive"];
export type ScheduledBusyPolicy = BurrowConfig["busyPolicy"]["scheduled"];
export type ToolSettings = z.infer<typeof ToolSettingsSchema>;

export interface LoadedConfig {
  config: BurrowConfig;
  paths: BurrowPaths;
}

export interface LoadConfigOptions {
  home?: string;
  env?: NodeJS.ProcessEnv;
}

const ENV_OVERRIDES: Array<{ env: string; apply: (raw: Record<string, unknown>, value: string) => void }> = [
  { env: "BURROW_LOG_LEVEL", apply: (raw, value) => (raw.logLevel = value) },
  { env: "BURROW_LOG_FORMAT", apply: (raw, value) => (raw.logFormat = value) },
  { env: "BURROW_TICK_INTERVAL_MS", apply: (raw, value) => (raw.tickIntervalMs = Number(value)) },
  {
    env: "BURROW_INVOCATION_TIMEOUT_MS",
    apply: (raw, value) => (raw.invocationTimeoutMs = Number(value)),
  },
  { env: "BURROW_AGENT_BIN", apply: (raw, value) => setNested(raw, "agent", "command", value) },
  { env: "BURROW_SANDBOX_HELPER", apply: (raw, value) => setNested(raw, "sandbox", "helper", value) },
];

export async function loadBurrowConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const paths = resolveBurrowPaths(options.home ?? resolveBurrowHome(env));
  const raw = await readConfigFile(paths.configFile);

  for (const override of ENV_OVERRIDES) {
    const value = normalizeValue(env[override.env]);
    if (value) {
      override.apply(raw, value);
    }
  }

  return { config: parseBurrowConfig(raw, paths.configFile), paths };
}

export function parseBurrowConfig(raw: unknown, source = "config"): BurrowConfig {
  const result = BurrowConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ValidationError("INVALID_CONFIG", `${source}: ${where}: ${issue.message}`);
  }
  return result.data;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let data: string;
  try {
    data = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ValidationError("INVALID_CONFIG", `${filePath}: invalid JSON (${String(error)})`);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError("INVALID_CONFIG", `${filePath}: expected a JSON object`);
  }
  return parsed;
}

function setNested(raw: Record<string, unknown>, section: string, key: string, value: unknown): void {
  const existing = raw[section];
  const target = isRecord(existing) ? existing : {};
  target[key] = value;
  raw[section] = target;
}

function normalizeValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
