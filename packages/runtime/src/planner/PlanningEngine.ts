import { z } from "zod";
import type { OrchestratorConfig } from "../config/index.js";
import { PlanValidationError, ValidationError, toErrorMessage } from "../errors/index.js";
import type { PlanIssue } from "../errors/index.js";
import { parseModelJson, truncate } from "../llm/json.js";
import { withRetry } from "../llm/retry.js";
import type { ChatMessage, CompletionClient } from "../llm/types.js";
import type { LongTermMemory } from "../memory/LongTermMemory.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type { Plan, SubTask } from "../types/index.js";
import { validateDependencyGraph } from "./dependencyGraph.js";
import { orderedSubtasks } from "./schedule.js";

export interface PlanningEngineOptions {
  completion: CompletionClient;
  config: OrchestratorConfig;
  toolRegistry?: ToolRegistry;
  longTermMemory?: LongTermMemory;
  systemPrompt?: string;
}

export interface PlanOptions {
  /** 附加给模型的上下文 */
  context?: Record<string, unknown>;
  signal?: AbortSignal;
}

const DEFAULT_SYSTEM_PROMPT = [
  "You are the planning component of a task-orchestration agent. Break the user's goal into subtasks that an executor with tool access can complete one at a time.",
  "",
  "=== Output Contract ===",
  "Reply with a single JSON object:",
  "{",
  '  "strategy": string,  // one or two sentences on the overall approach',
  '  "subtasks": [',
  "    {",
  '      "id": string,  // unique, e.g. "1", "2"',
  '      "description": string,  // what the executor must do',
  '      "reasoning": string,  // why this step is needed',
  '      "dependencies": string[]  // ids of subtasks that must finish first',
  "    }",
  "  ]",
  "}",
  "",
  "=== Planning Principles ===",
  "- Dependencies may only reference ids declared in the same plan; no cycles.",
  "- Prefer few, self-contained subtasks. Independent work must not depend on each other.",
  "- Output MUST be valid JSON. No comments, trailing commas, or extraneous text.",
].join("\n");

const LLMIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const LLMSubTaskSchema = z.object({
  id: LLMIdSchema.optional(),
  description: z.string().min(1),
  reasoning: z.string().optional(),
  dependencies: z.array(LLMIdSchema).optional(),
});

const LLMPlanSchema = z.object({
  strategy: z.string().optional(),
  subtasks: z.array(LLMSubTaskSchema),
});

type LLMPlan = z.infer<typeof LLMPlanSchema>;

/**
 * 负责把目标拆成依赖有序的计划，并在计划不合法时给出结构化问题列表。
 */
export class PlanningEngine {
  private readonly completion: CompletionClient;

  private readonly config: OrchestratorConfig;

  private readonly toolRegistry: ToolRegistry | undefined;

  private readonly longTermMemory: LongTermMemory | undefined;

  private readonly systemPrompt: string;

  constructor(options: PlanningEngineOptions) {
    this.completion = options.completion;
    this.config = options.config;
    this.toolRegistry = options.toolRegistry;
    this.longTermMemory = options.longTermMemory;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  public async plan(goal: string, options: PlanOptions = {}): Promise<Plan> {
    const normalizedGoal = goal.trim();
    if (!normalizedGoal) {
      throw new ValidationError("Goal must not be empty");
    }

    const history = await this.describeRecentRuns();
    const messages: ChatMessage[] = [
      { role: "system", content: this.composeSystemPrompt() },
      {
        role: "user",
        content: [
          `Goal: ${normalizedGoal}`,
          options.context && Object.keys(options.context).length > 0
            ? `Context:\n${JSON.stringify(options.context, null, 2)}`
            : "",
          history,
        ]
          .filter(Boolean)
          .join("\n\n"),
      },
    ];

    const llmPlan = await this.requestPlan(messages, options.signal);
    const subtasks = this.normalizeSubtasks(llmPlan);
    this.assertValid(subtasks);

    console.info(`[PlanningEngine] Planned ${subtasks.length} subtask(s) for goal`, {
      goal: truncate(normalizedGoal, 200),
    });

    return {
      goal: normalizedGoal,
      subtasks,
      strategy: llmPlan.strategy ?? "",
      createdAt: Date.now(),
    };
  }

  /**
   * 带修复提示的规划：校验失败时把问题列表带回模型重新生成。
   */
  public async planWithRepair(goal: string, options: PlanOptions = {}): Promise<Plan> {
    const { planning } = this.config;
    const attempts = planning.allowReplanning ? planning.maxPlanningAttempts : 1;
    let lastError: PlanValidationError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const context = lastError
        ? {
            ...(options.context ?? {}),
            previousPlanIssues: lastError.issues.map((issue) => issue.message),
            instruction: "The previous plan was rejected. Fix every listed issue.",
          }
        : options.context;
      try {
        return await this.plan(goal, { ...options, context });
      } catch (error) {
        if (!(error instanceof PlanValidationError)) {
          throw error;
        }
        lastError = error;
        console.warn(
          `[PlanningEngine] Plan attempt ${attempt}/${attempts} rejected: ${error.message}`
        );
      }
    }

    if (planning.fallbackToDirectExecution) {
      console.warn("[PlanningEngine] Falling back to direct execution plan");
      return directExecutionPlan(goal.trim());
    }

    throw lastError ?? new PlanValidationError([]);
  }

  /**
   * 在已有计划基础上重新规划。已完成的子任务保持 completed 与原结果。
   */
  public async replan(
    previous: Plan,
    completedIds: string[],
    failureReason: string,
    options: PlanOptions = {}
  ): Promise<Plan> {
    const completed = new Set(completedIds);
    const summary = previous.subtasks
      .map(
        (subtask) =>
          `- [${subtask.id}] (${subtask.status}) ${subtask.description}${
            subtask.dependencies.length > 0
              ? ` <- ${subtask.dependencies.join(", ")}`
              : ""
          }`
      )
      .join("\n");

    const messages: ChatMessage[] = [
      { role: "system", content: this.composeSystemPrompt() },
      {
        role: "user",
        content: [
          `Goal: ${previous.goal}`,
          "Previous plan:",
          summary,
          `Completed subtask ids (keep them unchanged): ${
            completedIds.length > 0 ? completedIds.join(", ") : "none"
          }`,
          `Failure reason: ${failureReason}`,
          "Produce a revised plan for the remaining work.",
        ].join("\n"),
      },
    ];

    const llmPlan = await this.requestPlan(messages, options.signal);
    const revised = this.normalizeSubtasks(llmPlan);
    const previousById = new Map(previous.subtasks.map((subtask) => [subtask.id, subtask]));

    // 模型遗漏的已完成子任务补回到计划前部
    const retained = previous.subtasks.filter(
      (subtask) => completed.has(subtask.id) && !revised.some((entry) => entry.id === subtask.id)
    );
    const subtasks = [...retained.map(cloneSubtask), ...revised].map((subtask): SubTask => {
      const before = previousById.get(subtask.id);
      if (completed.has(subtask.id) && before) {
        return {
          ...subtask,
          status: "completed",
          result: before.result ? { ...before.result } : null,
        };
      }
      return subtask;
    });

    this.assertValid(subtasks);

    console.info(`[PlanningEngine] Replanned into ${subtasks.length} subtask(s)`, {
      kept: retained.length,
      failureReason: truncate(failureReason, 200),
    });

    return {
      goal: previous.goal,
      subtasks,
      strategy: llmPlan.strategy ?? previous.strategy,
      createdAt: Date.now(),
    };
  }

  public topologicalOrder(plan: Plan): SubTask[] {
    return orderedSubtasks(plan);
  }

  private async requestPlan(messages: ChatMessage[], signal?: AbortSignal): Promise<LLMPlan> {
    const response = await withRetry(
      () =>
        this.completion.complete({
          messages,
          temperature: this.config.llm.temperature,
          maxTokens: this.config.llm.maxTokens,
          responseFormat: "json_object",
          purpose: "planning",
          signal,
        }),
      this.config.llm.retry,
      { signal, label: "[PlanningEngine]" }
    );

    if (!response.content) {
      throw new PlanValidationError([
        { code: "unparsable_response", message: "Planner returned no content" },
      ]);
    }

    const parsedJson = parseModelJson(response.content, "[PlanningEngine]");
    if (!parsedJson.ok) {
      throw new PlanValidationError([
        {
          code: "unparsable_response",
          message: `Planner response is not valid JSON (${parsedJson.error})`,
        },
      ]);
    }

    const parsed = LLMPlanSchema.safeParse(parsedJson.value);
    if (!parsed.success) {
      throw new PlanValidationError(
        parsed.error.issues.map((issue) => ({
          code: "schema_mismatch",
          message: `${issue.path.join(".") || "plan"}: ${issue.message}`,
        })),
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private normalizeSubtasks(llmPlan: LLMPlan): SubTask[] {
    return llmPlan.subtasks.map((entry, index): SubTask => ({
      id: entry.id ?? String(index + 1),
      description: entry.description.trim(),
      reasoning: entry.reasoning ?? "",
      dependencies: Array.from(new Set(entry.dependencies ?? [])),
      status: "pending",
      result: null,
    }));
  }

  private assertValid(subtasks: SubTask[]): void {
    const issues: PlanIssue[] = validateDependencyGraph(subtasks, {
      maxSubtasks: this.config.planning.maxSubtasks,
    });
    if (issues.length > 0) {
      throw new PlanValidationError(issues);
    }
  }

  private composeSystemPrompt(): string {
    const tools = this.toolRegistry?.list() ?? [];
    const toolLines =
      tools.length > 0
        ? tools.map((tool) => `- ${tool.name}: ${tool.description}`).join("\n")
        : "- (no tools registered)";
    return [
      this.systemPrompt,
      "",
      `=== Limits ===\n- At most ${this.config.planning.maxSubtasks} subtasks.`,
      "",
      `=== Available Tools ===\n${toolLines}`,
    ].join("\n");
  }

  private async describeRecentRuns(): Promise<string> {
    const limit = this.config.memory.recentRunLimit;
    if (!this.longTermMemory || limit <= 0) {
      return "";
    }
    try {
      const runs = await this.longTermMemory.recent(limit);
      if (runs.length === 0) {
        return "";
      }
      const lines = runs.map((run) => {
        const score = run.evaluation ? run.evaluation.overallScore.toFixed(2) : "n/a";
        return `- ${truncate(run.goal, 120)} (${run.status}, score ${score})`;
      });
      return `Recent runs:\n${lines.join("\n")}`;
    } catch (error) {
      console.warn(
        `[PlanningEngine] Failed to read recent runs (${toErrorMessage(error)})`
      );
      return "";
    }
  }
}

export function directExecutionPlan(goal: string): Plan {
  return {
    goal,
    subtasks: [
      {
        id: "1",
        description: goal,
        reasoning: "Direct execution fallback",
        dependencies: [],
        status: "pending",
        result: null,
      },
    ],
    strategy: "direct execution",
    createdAt: Date.now(),
  };
}

function cloneSubtask(subtask: SubTask): SubTask {
  return structuredClone(subtask);
}
