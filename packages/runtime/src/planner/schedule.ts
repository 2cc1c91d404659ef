import { OrchestratorError } from "../errors/index.js";
import type { Plan, SubTask, SubTaskResult } from "../types/index.js";
import { topologicalOrder } from "./dependencyGraph.js";

export const UNMET_DEPENDENCY_REASON = "unmet dependency";

export function orderedSubtasks(plan: Plan): SubTask[] {
  const byId = new Map(plan.subtasks.map((subtask) => [subtask.id, subtask]));
  return topologicalOrder(plan.subtasks).flatMap((id) => {
    const subtask = byId.get(id);
    return subtask ? [subtask] : [];
  });
}

/**
 * 按拓扑顺序找到下一个可执行的子任务。
 * 依赖失败或被跳过的子任务会在这里被标记为 skipped。
 * 没有可执行的子任务时返回 null。
 */
export function findNextRunnable(plan: Plan): SubTask | null {
  const byId = new Map(plan.subtasks.map((subtask) => [subtask.id, subtask]));

  for (const subtask of orderedSubtasks(plan)) {
    if (subtask.status !== "pending") {
      continue;
    }
    const dependencies = subtask.dependencies.flatMap((id) => {
      const dependency = byId.get(id);
      return dependency ? [dependency] : [];
    });
    const blocker = dependencies.find(
      (dependency) => dependency.status === "failed" || dependency.status === "skipped"
    );
    if (blocker) {
      subtask.status = "skipped";
      subtask.skipReason = `${UNMET_DEPENDENCY_REASON}: ${blocker.id} ${blocker.status}`;
      continue;
    }
    if (dependencies.every((dependency) => dependency.status === "completed")) {
      return subtask;
    }
  }
  return null;
}

export function markInProgress(plan: Plan, subtask: SubTask): void {
  const byId = new Map(plan.subtasks.map((entry) => [entry.id, entry]));
  const unmet = subtask.dependencies.filter((id) => byId.get(id)?.status !== "completed");
  if (unmet.length > 0) {
    throw new OrchestratorError(
      "internal",
      `Subtask ${subtask.id} started before dependencies completed: ${unmet.join(", ")}`
    );
  }
  subtask.status = "in_progress";
}

export function markFinished(subtask: SubTask, result: SubTaskResult): void {
  subtask.status = result.success ? "completed" : "failed";
  subtask.result = result;
}

export function skipRemaining(plan: Plan, reason: string): void {
  plan.subtasks.forEach((subtask) => {
    if (subtask.status === "pending" || subtask.status === "in_progress") {
      subtask.status = "skipped";
      subtask.skipReason = reason;
    }
  });
}

export interface PlanProgress {
  completed: number;
  failed: number;
  skipped: number;
  pending: number;
  total: number;
}

export function planProgress(plan: Plan): PlanProgress {
  const progress: PlanProgress = {
    completed: 0,
    failed: 0,
    skipped: 0,
    pending: 0,
    total: plan.subtasks.length,
  };
  plan.subtasks.forEach((subtask) => {
    if (subtask.status === "completed") progress.completed += 1;
    else if (subtask.status === "failed") progress.failed += 1;
    else if (subtask.status === "skipped") progress.skipped += 1;
    else progress.pending += 1;
  });
  return progress;
}

export function clonePlan(plan: Plan): Plan {
  return structuredClone(plan);
}
