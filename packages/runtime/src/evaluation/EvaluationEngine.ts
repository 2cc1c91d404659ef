import { z } from "zod";
import type { OrchestratorConfig } from "../config/index.js";
import { toErrorMessage } from "../errors/index.js";
import { parseModelJson, truncate } from "../llm/json.js";
import { withRetry } from "../llm/retry.js";
import type { CompletionClient } from "../llm/types.js";
import type {
  FinalEvaluation,
  Plan,
  StepEvaluation,
  SubTask,
  ThoughtRecord,
} from "../types/index.js";

export interface EvaluationEngineOptions {
  completion: CompletionClient;
  config: OrchestratorConfig;
}

export interface StepEvaluationOptions {
  expectedOutcome?: string;
  signal?: AbortSignal;
}

export interface FinalEvaluationOptions {
  finalOutput?: string | null;
  thoughts?: ThoughtRecord[];
  signal?: AbortSignal;
}

const STEP_SYSTEM_PROMPT = `You are an expert evaluator. Assess whether a task step was successful.

Provide your evaluation as JSON with this structure:
{
    "success": true/false,
    "score": 0.0-1.0,
    "reasoning": "Explanation of your evaluation",
    "issues": ["List of issues found"],
    "suggestions": ["List of suggestions for improvement"]
}`;

const FINAL_SYSTEM_PROMPT = `You are an expert evaluator conducting a final assessment of a task execution.

Analyze the overall performance and provide insights as JSON:
{
    "summary": "Overall summary of the execution",
    "strengths": ["List of strengths"],
    "weaknesses": ["List of weaknesses"],
    "lessons_learned": ["Key lessons from this execution"]
}`;

const StepReplySchema = z.object({
  success: z.boolean().optional(),
  score: z.number(),
  reasoning: z.string().optional(),
  issues: z.array(z.string()).optional(),
  suggestions: z.array(z.string()).optional(),
});

const FinalReplySchema = z.object({
  summary: z.string(),
  strengths: z.array(z.string()).optional(),
  weaknesses: z.array(z.string()).optional(),
  lessons_learned: z.array(z.string()).optional(),
  lessonsLearned: z.array(z.string()).optional(),
});

/**
 * 评估子任务与整次运行。得分一律由这里计算，模型只提供叙述与单步打分。
 */
export class EvaluationEngine {
  private readonly completion: CompletionClient;

  private readonly config: OrchestratorConfig;

  constructor(options: EvaluationEngineOptions) {
    this.completion = options.completion;
    this.config = options.config;
  }

  public async evaluateStep(
    subtask: SubTask,
    options: StepEvaluationOptions = {}
  ): Promise<StepEvaluation> {
    const result = subtask.result ?? null;
    if (subtask.status !== "completed" || !result) {
      // 未完成的步骤不调用模型，直接记 0 分
      const reason =
        subtask.skipReason ?? result?.error ?? `Step ended with status ${subtask.status}`;
      return {
        stepId: subtask.id,
        stepDescription: subtask.description,
        success: false,
        score: 0,
        reasoning: `Step was not completed (${subtask.status})`,
        issues: [reason],
        suggestions: [],
      };
    }

    const fallback: StepEvaluation = {
      stepId: subtask.id,
      stepDescription: subtask.description,
      success: result.success,
      score: result.success ? 1 : 0,
      reasoning: "Automatic evaluation based on result status",
      issues: result.success ? [] : [result.error ?? "Unknown error"],
      suggestions: [],
    };

    if (!this.config.evaluation.stepEvaluation) {
      return fallback;
    }

    const userPrompt = [
      `Step: ${subtask.description}`,
      `Expected Outcome: ${options.expectedOutcome ?? (subtask.reasoning || "The step is completed")}`,
      `Actual Result: ${JSON.stringify(result, null, 2)}`,
      "",
      "Please evaluate this step.",
    ].join("\n");

    const reply = await this.requestJson(STEP_SYSTEM_PROMPT, userPrompt, options.signal);
    if (reply === null) {
      return fallback;
    }
    const parsed = StepReplySchema.safeParse(reply);
    if (!parsed.success) {
      console.warn(
        `[EvaluationEngine] Step ${subtask.id} evaluation has unexpected shape, using fallback`
      );
      return fallback;
    }

    const score = clampScore(parsed.data.score);
    return {
      stepId: subtask.id,
      stepDescription: subtask.description,
      // 模型未给出 success 时按得分与阈值判定
      success: parsed.data.success ?? score >= this.config.evaluation.successThreshold,
      score,
      reasoning: parsed.data.reasoning ?? "",
      issues: parsed.data.issues ?? [],
      suggestions: parsed.data.suggestions ?? [],
    };
  }

  public async evaluateFinal(
    goal: string,
    plan: Plan,
    stepEvaluations: StepEvaluation[],
    options: FinalEvaluationOptions = {}
  ): Promise<FinalEvaluation> {
    const overallScore = computeOverallScore(plan, stepEvaluations);
    const overallSuccess = overallScore >= this.config.evaluation.successThreshold;
    const byId = new Map(stepEvaluations.map((evaluation) => [evaluation.stepId, evaluation]));
    const ordered = plan.subtasks.flatMap((subtask) => {
      const evaluation = byId.get(subtask.id);
      return evaluation ? [evaluation] : [];
    });

    const fallback: FinalEvaluation = {
      goal,
      overallSuccess,
      overallScore,
      summary: `Task ${
        overallSuccess ? "completed successfully" : "failed"
      } with an overall score of ${overallScore.toFixed(2)}`,
      strengths: ["Task execution attempted"],
      weaknesses: overallSuccess ? [] : ["Some steps failed"],
      lessonsLearned: [],
      stepEvaluations: ordered,
    };

    if (!this.config.evaluation.finalEvaluation) {
      return fallback;
    }

    const stepsSummary = plan.subtasks
      .map((subtask) => {
        const evaluation = byId.get(subtask.id);
        const score = evaluation ? evaluation.score : 0;
        return `Step ${subtask.id}: ${subtask.description} - ${
          evaluation?.success ? "Success" : "Failed"
        } (Score: ${score})`;
      })
      .join("\n");

    const thoughtLines = (options.thoughts ?? [])
      .slice(-5)
      .map((thought) => `- [${thought.kind}] ${truncate(thought.content, 200)}`);

    const userPrompt = [
      `Goal: ${goal}`,
      "",
      "Steps Executed:",
      stepsSummary || "(none)",
      "",
      `Overall Score: ${overallScore.toFixed(2)}`,
      "",
      `Final Output: ${options.finalOutput ?? "(none)"}`,
      ...(thoughtLines.length > 0 ? ["", "Recent thoughts:", ...thoughtLines] : []),
      "",
      "Please provide a comprehensive final evaluation.",
    ].join("\n");

    const reply = await this.requestJson(FINAL_SYSTEM_PROMPT, userPrompt, options.signal);
    if (reply === null) {
      return fallback;
    }
    const parsed = FinalReplySchema.safeParse(reply);
    if (!parsed.success) {
      console.warn("[EvaluationEngine] Final evaluation has unexpected shape, using fallback");
      return fallback;
    }

    return {
      ...fallback,
      summary: parsed.data.summary,
      strengths: parsed.data.strengths ?? [],
      weaknesses: parsed.data.weaknesses ?? [],
      lessonsLearned: parsed.data.lessons_learned ?? parsed.data.lessonsLearned ?? [],
    };
  }

  private async requestJson(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      const response = await withRetry(
        () =>
          this.completion.complete({
            messages: [
              { role: "system", content: systemPrompt },
              { role: "user", content: userPrompt },
            ],
            temperature: this.config.evaluation.temperature,
            maxTokens: this.config.llm.maxTokens,
            responseFormat: "json_object",
            purpose: "evaluation",
            signal,
          }),
        this.config.llm.retry,
        { signal, label: "[EvaluationEngine]" }
      );
      if (!response.content) {
        return null;
      }
      const parsed = parseModelJson(response.content, "[EvaluationEngine]");
      return parsed.ok ? parsed.value : null;
    } catch (error) {
      console.warn(`[EvaluationEngine] Evaluation call failed (${toErrorMessage(error)})`);
      return null;
    }
  }
}

/** 全部子任务的平均分；没有评估的子任务记 0，空计划记 0 */
export function computeOverallScore(plan: Plan, stepEvaluations: StepEvaluation[]): number {
  if (plan.subtasks.length === 0) {
    return 0;
  }
  const byId = new Map(stepEvaluations.map((evaluation) => [evaluation.stepId, evaluation.score]));
  const total = plan.subtasks.reduce((sum, subtask) => sum + (byId.get(subtask.id) ?? 0), 0);
  return total / plan.subtasks.length;
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}
