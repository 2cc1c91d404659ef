import { z } from "zod";
import { validateDependencyGraph } from "../planner/dependencyGraph.js";

export const SubTaskStatusSchema = z.enum([
  "pending", // 尚未执行
  "in_progress", // 正在执行
  "completed", // 已成功完成
  "failed", // 执行失败
  "skipped", // 依赖未满足而被跳过
]);

export const SubTaskResultSchema = z
  .object({
    /** 执行是否成功 */
    success: z.boolean(),
    /** 模型的最终回答 */
    output: z.string().nullable(),
    /** 失败原因 */
    error: z.string().nullable(),
    /** 本步骤内发生的工具调用次数 */
    toolCalls: z.number().int().nonnegative(),
    /** 本步骤消耗的模型调用次数 */
    iterations: z.number().int().nonnegative(),
  })
  .strict();

export const SubTaskSchema = z
  .object({
    /** 子任务 ID，计划内唯一 */
    id: z.string().min(1),
    /** 需要完成的工作 */
    description: z.string().min(1),
    /** 规划时给出的理由 */
    reasoning: z.string(),
    /** 前置子任务 ID 列表 */
    dependencies: z
      .array(z.string().min(1))
      .refine((ids) => new Set(ids).size === ids.length, {
        message: "dependencies must not contain duplicates",
      }),
    /** 当前状态，仅由执行过程更新 */
    status: SubTaskStatusSchema,
    /** 可选：执行结果 */
    result: SubTaskResultSchema.nullable().optional(),
    /** 可选：被跳过的原因 */
    skipReason: z.string().optional(),
  })
  .strict();

export const PlanSchema = z
  .object({
    /** 用户目标 */
    goal: z.string().min(1),
    /** 按声明顺序排列的子任务 */
    subtasks: z.array(SubTaskSchema),
    /** 规划策略说明 */
    strategy: z.string(),
    /** 创建时间（毫秒时间戳） */
    createdAt: z.number().int().nonnegative(),
  })
  .strict()
  .superRefine((plan, ctx) => {
    validateDependencyGraph(plan.subtasks).forEach((issue) => {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["subtasks"],
        message: issue.message,
      });
    });
  });

export const StepEvaluationSchema = z
  .object({
    stepId: z.string().min(1),
    stepDescription: z.string(),
    success: z.boolean(),
    /** 0 到 1 之间的得分 */
    score: z.number().min(0).max(1),
    reasoning: z.string(),
    issues: z.array(z.string()),
    suggestions: z.array(z.string()),
  })
  .strict();

export const FinalEvaluationSchema = z
  .object({
    goal: z.string(),
    overallSuccess: z.boolean(),
    /** 全部子任务得分的平均值 */
    overallScore: z.number().min(0).max(1),
    summary: z.string(),
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    lessonsLearned: z.array(z.string()),
    stepEvaluations: z.array(StepEvaluationSchema),
  })
  .strict();

export const AgentRoleSchema = z.enum(["planner", "executor", "reviewer", "system"]);

export const AgentMessageSchema = z
  .object({
    sender: AgentRoleSchema,
    /** 接收方角色，或 all 表示广播 */
    recipient: z.union([AgentRoleSchema, z.literal("all")]),
    content: z.string(),
    metadata: z.record(z.string(), z.unknown()),
    timestamp: z.number().int().nonnegative(),
  })
  .strict();

export const ThoughtKindSchema = z.enum([
  "observation", // 观察
  "reasoning", // 推理
  "reflection", // 反思
  "decision", // 决策
]);

export const ThoughtRecordSchema = z
  .object({
    id: z.string().min(1),
    kind: ThoughtKindSchema,
    content: z.string(),
    /** 可选：关联的子任务 */
    subtaskId: z.string().nullable(),
    timestamp: z.number().int().nonnegative(),
  })
  .strict();

export const StructuredErrorSchema = z.object({
  kind: z.enum([
    "validation",
    "transient_provider",
    "fatal_provider",
    "tool_execution",
    "iteration_budget_exceeded",
    "execution_failure",
    "cancelled",
    "internal",
  ]),
  name: z.string(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()),
});

export const RunStatusSchema = z.enum(["completed", "failed", "cancelled"]);

export const RunRecordSchema = z
  .object({
    runId: z.string().min(1),
    goal: z.string(),
    status: RunStatusSchema,
    plan: PlanSchema.nullable(),
    evaluation: FinalEvaluationSchema.nullable(),
    /** 角色之间的消息往来 */
    transcript: z.array(AgentMessageSchema),
    thoughts: z.array(ThoughtRecordSchema),
    error: StructuredErrorSchema.nullable(),
    completedAt: z.number().int().nonnegative(),
  })
  .strict();

export type SubTaskStatus = z.infer<typeof SubTaskStatusSchema>;
export type SubTaskResult = z.infer<typeof SubTaskResultSchema>;
export type SubTask = z.infer<typeof SubTaskSchema>;
export type Plan = z.infer<typeof PlanSchema>;
export type StepEvaluation = z.infer<typeof StepEvaluationSchema>;
export type FinalEvaluation = z.infer<typeof FinalEvaluationSchema>;
export type AgentRole = z.infer<typeof AgentRoleSchema>;
export type AgentMessage = z.infer<typeof AgentMessageSchema>;
export type ThoughtKind = z.infer<typeof ThoughtKindSchema>;
export type ThoughtRecord = z.infer<typeof ThoughtRecordSchema>;
export type RunStatus = z.infer<typeof RunStatusSchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;
