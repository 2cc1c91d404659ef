import { assign, fromPromise, setup } from 'xstate';
import { toStructuredError } from '../errors/index.js';
import type { Plan, StepEvaluation, SubTask } from '../types/index.js';
import type {
  AggregateInput,
  AggregateResult,
  CollaborationMachineContext,
  CollaborationMachineEvents,
  CollaborationMachineInput,
  CollaborationMachineOutput,
  CollaborationServices,
} from './collaborationTypes.js';

export type {
  CollaborationMachineContext,
  CollaborationMachineEvents,
  CollaborationMachineInput,
  CollaborationMachineOutput,
  CollaborationServices,
} from './collaborationTypes.js';

/**
 * 多角色协作流程：
 * idle → planning → scheduling → executing → reviewing → scheduling … → aggregating → done | failed
 *
 * 评审失败时，在预算内回到 replanning；预算耗尽则直接汇总并以 failed 结束。
 */
export function createCollaborationMachine(services: CollaborationServices) {
  return setup({
    types: {
      context: {} as CollaborationMachineContext,
      events: {} as CollaborationMachineEvents,
      input: {} as CollaborationMachineInput,
      output: {} as CollaborationMachineOutput,
    },
    actors: {
      planner: fromPromise<Plan>(() => services.plan()),
      scheduler: fromPromise<SubTask | null>(() => services.scheduleNext()),
      executor: fromPromise<void, { subtaskId: string }>(({ input }) =>
        services.execute(input.subtaskId)
      ),
      reviewer: fromPromise<StepEvaluation, { subtaskId: string }>(({ input }) =>
        services.review(input.subtaskId)
      ),
      replanner: fromPromise<Plan, { failureReason: string }>(({ input }) =>
        services.replan(input.failureReason)
      ),
      aggregator: fromPromise<AggregateResult, AggregateInput>(({ input }) =>
        services.aggregate(input)
      ),
    },
    guards: {
      canReplan: ({ context }) =>
        context.allowReplanning && context.replans < context.maxReplans && !services.isCancelled(),
      replanBudgetExhausted: ({ context }) =>
        context.allowReplanning && context.replans >= context.maxReplans && !services.isCancelled(),
    },
  }).createMachine({
    id: 'collaboration',
    initial: 'idle',
    context: ({ input }) => ({
      currentSubtaskId: null,
      stepEvaluations: [],
      lastFailure: null,
      replans: 0,
      maxReplans: input.maxReplans,
      allowReplanning: input.allowReplanning,
      exhausted: false,
      evaluation: null,
      error: null,
    }),
    states: {
      idle: {
        on: { START: 'planning' },
      },
      planning: {
        invoke: {
          id: 'planner',
          src: 'planner',
          onDone: 'scheduling',
          onError: {
            target: 'failed',
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      scheduling: {
        invoke: {
          id: 'scheduler',
          src: 'scheduler',
          onDone: [
            {
              guard: ({ event }) => event.output === null,
              target: 'aggregating',
              actions: assign({ currentSubtaskId: () => null }),
            },
            {
              target: 'executing',
              actions: assign({ currentSubtaskId: ({ event }) => event.output?.id ?? null }),
            },
          ],
          onError: {
            target: 'failed',
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      executing: {
        invoke: {
          id: 'executor',
          src: 'executor',
          input: ({ context }) => ({ subtaskId: context.currentSubtaskId ?? '' }),
          onDone: 'reviewing',
          onError: {
            target: 'failed',
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      reviewing: {
        invoke: {
          id: 'reviewer',
          src: 'reviewer',
          input: ({ context }) => ({ subtaskId: context.currentSubtaskId ?? '' }),
          onDone: [
            {
              guard: ({ event }) => event.output.success,
              target: 'scheduling',
              actions: assign({
                stepEvaluations: ({ context, event }) => [...context.stepEvaluations, event.output],
              }),
            },
            {
              guard: 'canReplan',
              target: 'replanning',
              actions: assign({
                stepEvaluations: ({ context, event }) => [...context.stepEvaluations, event.output],
                lastFailure: ({ event }) => describeFailure(event.output),
              }),
            },
            {
              guard: 'replanBudgetExhausted',
              target: 'aggregating',
              actions: assign({
                stepEvaluations: ({ context, event }) => [...context.stepEvaluations, event.output],
                exhausted: () => true,
              }),
            },
            // 未开启重规划：失败只影响依赖它的子任务
            {
              target: 'scheduling',
              actions: assign({
                stepEvaluations: ({ context, event }) => [...context.stepEvaluations, event.output],
              }),
            },
          ],
          onError: {
            target: 'failed',
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      replanning: {
        invoke: {
          id: 'replanner',
          src: 'replanner',
          input: ({ context }) => ({ failureReason: context.lastFailure ?? 'Step failed' }),
          onDone: {
            target: 'scheduling',
            actions: assign({
              replans: ({ context }) => context.replans + 1,
              // 只保留新计划中仍为 completed 的子任务评估
              stepEvaluations: ({ context, event }) =>
                context.stepEvaluations.filter((evaluation) =>
                  event.output.subtasks.some(
                    (subtask) => subtask.id === evaluation.stepId && subtask.status === 'completed'
                  )
                ),
            }),
          },
          onError: {
            target: 'aggregating',
            actions: assign({
              exhausted: () => true,
              error: ({ event }) => toStructuredError(event.error),
            }),
          },
        },
      },
      aggregating: {
        invoke: {
          id: 'aggregator',
          src: 'aggregator',
          input: ({ context }) => ({
            stepEvaluations: context.stepEvaluations,
            exhausted: context.exhausted,
          }),
          onDone: [
            {
              guard: ({ context }) => context.exhausted,
              target: 'failed',
              actions: assign({
                evaluation: ({ event }) => event.output.evaluation,
                stepEvaluations: ({ event }) => event.output.stepEvaluations,
              }),
            },
            {
              target: 'done',
              actions: assign({
                evaluation: ({ event }) => event.output.evaluation,
                stepEvaluations: ({ event }) => event.output.stepEvaluations,
              }),
            },
          ],
          onError: {
            target: 'failed',
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      done: { type: 'final' },
      failed: { type: 'final' },
    },
    output: ({ context }) => ({
      succeeded: !context.exhausted && context.error === null && context.evaluation !== null,
      evaluation: context.evaluation,
      stepEvaluations: context.stepEvaluations,
      replans: context.replans,
      exhausted: context.exhausted,
      error: context.error,
    }),
  });
}

function describeFailure(evaluation: StepEvaluation): string {
  const issues = evaluation.issues.length > 0 ? evaluation.issues.join('; ') : evaluation.reasoning;
  return `Subtask ${evaluation.stepId} failed review (score ${evaluation.score.toFixed(2)}): ${issues}`;
}
