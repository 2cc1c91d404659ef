import type { ExecutionEngine, ExecutionResult } from "../core/ExecutionEngine.js";
import type { RunContext } from "../core/RunContext.js";
import { dependencyOutputs } from "../core/runOutcome.js";
import { markFinished, markInProgress } from "../planner/schedule.js";
import type { Plan, SubTask } from "../types/index.js";

// 执行角色：领取子任务、驱动执行循环、把结果交给 reviewer
export class ExecutorRole {
  public readonly role = "executor" as const;

  constructor(private readonly executor: ExecutionEngine) {}

  public async execute(run: RunContext, plan: Plan, subtask: SubTask): Promise<ExecutionResult> {
    run.addMessage("planner", this.role, `Execute subtask ${subtask.id}: ${subtask.description}`, {
      subtaskId: subtask.id,
    });
    markInProgress(plan, subtask);

    const result = await this.executor.executeSubtask(subtask, run, dependencyOutputs(plan, subtask));

    if (result.error?.kind === "cancelled") {
      subtask.status = "skipped";
      subtask.skipReason = "run cancelled";
    } else {
      markFinished(subtask, {
        success: result.success,
        output: result.output,
        error: result.error?.message ?? null,
        toolCalls: result.toolCalls,
        iterations: result.iterations,
      });
    }

    run.addMessage(
      this.role,
      "reviewer",
      result.success
        ? `Subtask ${subtask.id} finished`
        : `Subtask ${subtask.id} failed: ${result.error?.message ?? "unknown error"}`,
      { subtaskId: subtask.id, iterations: result.iterations, toolCalls: result.toolCalls }
    );
    return result;
  }
}
