import type { ExecutorRole } from '../collaboration/ExecutorRole.js';
import type { PlannerRole } from '../collaboration/PlannerRole.js';
import type { ReviewerRole } from '../collaboration/ReviewerRole.js';
import type { RunContext } from '../core/RunContext.js';
import { lastOutput } from '../core/runOutcome.js';
import { OrchestratorError } from '../errors/index.js';
import { findNextRunnable, planProgress, skipRemaining } from '../planner/schedule.js';
import type { Plan, SubTask } from '../types/index.js';
import type { CollaborationServices } from './collaborationTypes.js';

export interface CollaborationRoles {
  planner: PlannerRole;
  executor: ExecutorRole;
  reviewer: ReviewerRole;
}

/**
 * 把三个角色绑定到一次运行上，供协作状态机调用。
 */
export function createCollaborationServices(
  roles: CollaborationRoles,
  run: RunContext,
  planningContext?: Record<string, unknown>
): CollaborationServices {
  const requirePlan = (): Plan => {
    const plan = run.getPlan();
    if (!plan) {
      throw new OrchestratorError('internal', 'No plan available for this run');
    }
    return plan;
  };

  const requireSubtask = (plan: Plan, subtaskId: string): SubTask => {
    const subtask = plan.subtasks.find((entry) => entry.id === subtaskId);
    if (!subtask) {
      throw new OrchestratorError('internal', `Unknown subtask ${subtaskId}`);
    }
    return subtask;
  };

  const emitProgress = (plan: Plan, data: Record<string, unknown> = {}) => {
    const progress = planProgress(plan);
    run.stream.emitProgress(
      progress.completed + progress.failed + progress.skipped,
      progress.total,
      data
    );
  };

  return {
    plan: () => roles.planner.createPlan(run, planningContext),

    scheduleNext: async () => {
      const plan = requirePlan();
      if (run.isCancelled()) {
        skipRemaining(plan, 'run cancelled');
        return null;
      }
      const next = findNextRunnable(plan);
      if (next) {
        emitProgress(plan, { currentStep: next.id, description: next.description });
      }
      return next;
    },

    execute: async (subtaskId) => {
      const plan = requirePlan();
      const subtask = requireSubtask(plan, subtaskId);
      const result = await roles.executor.execute(run, plan, subtask);
      if (result.success) {
        await run.thinking.reflectOnAction(
          subtask.description,
          result.output,
          subtask.reasoning || 'The step is completed',
          subtask.id
        );
      } else if (result.error?.kind !== 'cancelled') {
        await run.thinking.analyzeFailure(
          subtask.description,
          result.error?.message ?? 'Unknown error',
          result.iterations,
          subtask.id
        );
      }
    },

    review: (subtaskId) => {
      const plan = requirePlan();
      return roles.reviewer.reviewStep(run, requireSubtask(plan, subtaskId));
    },

    replan: (failureReason) => roles.planner.revisePlan(run, failureReason),

    aggregate: async ({ stepEvaluations, exhausted }) => {
      const plan = requirePlan();
      if (exhausted) {
        skipRemaining(plan, 'replan budget exhausted');
      }
      emitProgress(plan);
      return roles.reviewer.reviewRun(run, plan, stepEvaluations, lastOutput(plan));
    },

    isCancelled: () => run.isCancelled(),
  };
}
