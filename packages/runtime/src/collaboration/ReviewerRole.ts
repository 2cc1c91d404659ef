import type { RunContext } from "../core/RunContext.js";
import type { EvaluationEngine } from "../evaluation/EvaluationEngine.js";
import type { FinalEvaluation, Plan, StepEvaluation, SubTask } from "../types/index.js";

/**
 * 评审角色：给单步与整次运行打分。
 * 单步失败时会通知 planner，是否重规划由编排状态机决定。
 */
export class ReviewerRole {
  public readonly role = "reviewer" as const;

  constructor(private readonly evaluator: EvaluationEngine) {}

  public async reviewStep(run: RunContext, subtask: SubTask): Promise<StepEvaluation> {
    const evaluation = await this.evaluator.evaluateStep(subtask, { signal: run.signal });
    run.stream.emitEvaluation("step", evaluation);
    run.addMessage(
      this.role,
      evaluation.success ? "all" : "planner",
      `Subtask ${subtask.id} scored ${evaluation.score.toFixed(2)}${
        evaluation.success ? "" : `: ${evaluation.issues.join("; ") || evaluation.reasoning}`
      }`,
      { subtaskId: subtask.id, success: evaluation.success, score: evaluation.score }
    );
    return evaluation;
  }

  public async reviewRun(
    run: RunContext,
    plan: Plan,
    stepEvaluations: StepEvaluation[],
    finalOutput: string | null
  ): Promise<{ evaluation: FinalEvaluation; stepEvaluations: StepEvaluation[] }> {
    // 没有评审记录的子任务（跳过、取消）补一条 0 分评估
    const complete = [...stepEvaluations];
    for (const subtask of plan.subtasks) {
      if (!complete.some((entry) => entry.stepId === subtask.id)) {
        complete.push(await this.evaluator.evaluateStep(subtask));
      }
    }

    const evaluation = await this.evaluator.evaluateFinal(run.goal, plan, complete, {
      finalOutput,
      thoughts: run.thinking.thoughts(),
      signal: run.signal,
    });
    run.stream.emitEvaluation("final", evaluation);
    run.addMessage(this.role, "all", evaluation.summary, {
      overallScore: evaluation.overallScore,
      overallSuccess: evaluation.overallSuccess,
    });
    return { evaluation, stepEvaluations: complete };
  }
}
