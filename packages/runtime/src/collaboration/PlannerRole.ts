import type { RunContext } from "../core/RunContext.js";
import type { PlanningEngine } from "../planner/PlanningEngine.js";
import { clonePlan } from "../planner/schedule.js";
import type { Plan } from "../types/index.js";

/**
 * 规划角色：包装 PlanningEngine，并把每次规划结果写入角色消息记录。
 */
export class PlannerRole {
  public readonly role = "planner" as const;

  constructor(private readonly planner: PlanningEngine) {}

  public async createPlan(run: RunContext, context?: Record<string, unknown>): Promise<Plan> {
    run.stream.emitPlanning("Planner is decomposing the goal", { goal: run.goal });
    const plan = await this.planner.planWithRepair(run.goal, { context, signal: run.signal });
    run.setPlan(plan);
    run.addMessage(this.role, "all", `Created plan with ${plan.subtasks.length} subtask(s)`, {
      strategy: plan.strategy,
      subtaskIds: plan.subtasks.map((subtask) => subtask.id),
    });
    run.stream.emitPlanning("Plan ready", { plan: clonePlan(plan) });
    return plan;
  }

  public async revisePlan(run: RunContext, failureReason: string): Promise<Plan> {
    const previous = run.getPlan();
    if (!previous) {
      return this.createPlan(run);
    }
    const completedIds = previous.subtasks
      .filter((subtask) => subtask.status === "completed")
      .map((subtask) => subtask.id);

    run.stream.emitPlanning("Planner is revising the plan", { failureReason });
    const revised = await this.planner.replan(previous, completedIds, failureReason, {
      signal: run.signal,
    });
    run.setPlan(revised);
    run.addMessage(
      this.role,
      "all",
      `Revised plan with ${revised.subtasks.length} subtask(s)`,
      { failureReason, keptSubtaskIds: completedIds }
    );
    run.stream.emitPlanning("Plan revised", { plan: clonePlan(revised) });
    return revised;
  }
}
