import { z } from "zod";
import { ValidationError } from "../errors/index.js";

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(3),
    initialDelayMs: z.number().int().nonnegative().default(4_000),
    maxDelayMs: z.number().int().nonnegative().default(10_000),
    multiplier: z.number().min(1).default(2),
  })
  .strict();

export const OrchestratorConfigSchema = z
  .object({
    agent: z
      .object({
        name: z.string().min(1).default("TaskWeave"),
        /** 单个任务内允许的模型调用上限 */
        maxIterations: z.number().int().min(1).default(10),
        thinkingEnabled: z.boolean().default(true),
      })
      .strict()
      .default({}),
    llm: z
      .object({
        temperature: z.number().min(0).max(2).default(0.7),
        maxTokens: z.number().int().positive().default(4096),
        retry: RetryConfigSchema.default({}),
      })
      .strict()
      .default({}),
    planning: z
      .object({
        maxSubtasks: z.number().int().min(1).default(20),
        allowReplanning: z.boolean().default(true),
        /** plan 校验失败后的总尝试次数 */
        maxPlanningAttempts: z.number().int().min(1).default(3),
        /** 协作模式下评审失败后的最大重规划次数 */
        maxReplans: z.number().int().nonnegative().default(2),
        fallbackToDirectExecution: z.boolean().default(false),
      })
      .strict()
      .default({}),
    evaluation: z
      .object({
        stepEvaluation: z.boolean().default(true),
        finalEvaluation: z.boolean().default(true),
        successThreshold: z.number().min(0).max(1).default(0.7),
        temperature: z.number().min(0).max(2).default(0.3),
      })
      .strict()
      .default({}),
    memory: z
      .object({
        maxWorkingMessages: z.number().int().min(2).default(50),
        /** 规划时带入的历史运行记录条数 */
        recentRunLimit: z.number().int().nonnegative().default(5),
      })
      .strict()
      .default({}),
    stream: z
      .object({
        subscriberQueueLimit: z.number().int().min(1).default(256),
        historyLimit: z.number().int().nonnegative().default(1000),
      })
      .strict()
      .default({}),
  })
  .strict();

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

type EnvSource = Record<string, string | undefined>;

type EnvValueKind = "int" | "number" | "boolean" | "string";

// ORCHESTRATOR_<SECTION>_<KEY> -> [section, key, kind]
const ENV_BINDINGS: Array<[string, string, string, EnvValueKind]> = [
  ["ORCHESTRATOR_AGENT_NAME", "agent", "name", "string"],
  ["ORCHESTRATOR_AGENT_MAX_ITERATIONS", "agent", "maxIterations", "int"],
  ["ORCHESTRATOR_AGENT_THINKING_ENABLED", "agent", "thinkingEnabled", "boolean"],
  ["ORCHESTRATOR_LLM_TEMPERATURE", "llm", "temperature", "number"],
  ["ORCHESTRATOR_LLM_MAX_TOKENS", "llm", "maxTokens", "int"],
  ["ORCHESTRATOR_PLANNING_MAX_SUBTASKS", "planning", "maxSubtasks", "int"],
  ["ORCHESTRATOR_PLANNING_ALLOW_REPLANNING", "planning", "allowReplanning", "boolean"],
  ["ORCHESTRATOR_PLANNING_MAX_ATTEMPTS", "planning", "maxPlanningAttempts", "int"],
  ["ORCHESTRATOR_PLANNING_MAX_REPLANS", "planning", "maxReplans", "int"],
  ["ORCHESTRATOR_EVALUATION_STEP", "evaluation", "stepEvaluation", "boolean"],
  ["ORCHESTRATOR_EVALUATION_FINAL", "evaluation", "finalEvaluation", "boolean"],
  ["ORCHESTRATOR_EVALUATION_SUCCESS_THRESHOLD", "evaluation", "successThreshold", "number"],
  ["ORCHESTRATOR_MEMORY_MAX_WORKING_MESSAGES", "memory", "maxWorkingMessages", "int"],
  ["ORCHESTRATOR_STREAM_QUEUE_LIMIT", "stream", "subscriberQueueLimit", "int"],
  ["ORCHESTRATOR_STREAM_HISTORY_LIMIT", "stream", "historyLimit", "int"],
];

/**
 * 合并配置：显式覆盖 > ORCHESTRATOR_* 环境变量 > 默认值。
 * 任何非法值都会抛出 ValidationError。
 */
export function loadConfig(
  overrides: OrchestratorConfigInput = {},
  env: EnvSource = process.env
): OrchestratorConfig {
  const fromEnv = readEnvOverrides(env);
  const merged = mergeSections(fromEnv, toRecord(overrides));
  const parsed = OrchestratorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid orchestrator configuration: ${detail}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function defaultConfig(): OrchestratorConfig {
  return OrchestratorConfigSchema.parse({});
}

function readEnvOverrides(env: EnvSource): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  ENV_BINDINGS.forEach(([name, section, key, kind]) => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
      return;
    }
    const value = coerceEnvValue(name, raw.trim(), kind);
    result[section] = { ...(result[section] ?? {}), [key]: value };
  });
  return result;
}

function coerceEnvValue(name: string, raw: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case "string":
      return raw;
    case "boolean": {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "on"].includes(lowered)) return true;
      if (["0", "false", "no", "off"].includes(lowered)) return false;
      throw new ValidationError(`${name} must be a boolean, received "${raw}"`);
    }
    case "int":
    case "number": {
      const value = Number(raw);
      if (!Number.isFinite(value) || (kind === "int" && !Number.isInteger(value))) {
        throw new ValidationError(
          `${name} must be ${kind === "int" ? "an integer" : "a number"}, received "${raw}"`
        );
      }
      return value;
    }
  }
}

function mergeSections(
  base: Record<string, Record<string, unknown>>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  Object.entries(overrides).forEach(([section, value]) => {
    const existing = merged[section];
    if (isPlainRecord(value) && isPlainRecord(existing)) {
      merged[section] = { ...existing, ...value };
    } else if (value !== undefined) {
      merged[section] = value;
    }
  });
  return merged;
}

function toRecord(value: OrchestratorConfigInput): Record<string, unknown> {
  return { ...value };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
