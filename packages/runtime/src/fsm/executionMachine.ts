import { assign, fromPromise, setup } from "xstate";
import {
  CancelledError,
  ExecutionFailure,
  IterationBudgetExceededError,
  OrchestratorError,
  TransientProviderError,
  toStructuredError,
} from "../errors/index.js";
import type { StructuredError } from "../errors/index.js";
import type { ToolInvocation } from "../types/index.js";
import type {
  ExecutionMachineContext,
  ExecutionMachineInput,
  ExecutionMachineOutput,
  ExecutionServices,
  IdentifiedToolCall,
  ModelTurn,
} from "./executionTypes.js";

export type {
  ExecutionMachineContext,
  ExecutionMachineInput,
  ExecutionMachineOutput,
} from "./executionTypes.js";

/**
 * 单个任务的工具调用循环：
 * checking → awaitingModel → dispatchingTools → checking … → done | failed
 *
 * checking 是每轮的边界：先检查取消，再检查迭代预算。
 */
export function createExecutionMachine(services: ExecutionServices) {
  return setup({
    types: {
      context: {} as ExecutionMachineContext,
      input: {} as ExecutionMachineInput,
      output: {} as ExecutionMachineOutput,
    },
    actors: {
      callModel: fromPromise<ModelTurn, { iteration: number }>(({ input }) =>
        services.callModel(input.iteration)
      ),
      dispatchTools: fromPromise<ToolInvocation[], { calls: IdentifiedToolCall[] }>(
        ({ input }) => services.dispatchTools(input.calls)
      ),
    },
    guards: {
      isCancelled: () => services.isCancelled(),
      budgetExhausted: ({ context }) => context.iterations >= context.maxIterations,
    },
  }).createMachine({
    id: "execution",
    initial: "checking",
    context: ({ input }) => ({
      iterations: 0,
      maxIterations: input.maxIterations,
      toolCallCount: 0,
      pendingToolCalls: [],
      output: null,
      error: null,
    }),
    states: {
      checking: {
        always: [
          {
            guard: "isCancelled",
            target: "failed",
            actions: assign({ error: () => new CancelledError().toJSON() }),
          },
          {
            guard: "budgetExhausted",
            target: "failed",
            actions: assign({
              error: ({ context }) =>
                new IterationBudgetExceededError(context.maxIterations).toJSON(),
            }),
          },
          {
            target: "awaitingModel",
            actions: assign({ iterations: ({ context }) => context.iterations + 1 }),
          },
        ],
      },
      awaitingModel: {
        invoke: {
          id: "model",
          src: "callModel",
          input: ({ context }) => ({ iteration: context.iterations }),
          onDone: [
            {
              guard: ({ event }) => event.output.toolCalls.length > 0,
              target: "dispatchingTools",
              actions: assign({ pendingToolCalls: ({ event }) => event.output.toolCalls }),
            },
            {
              target: "done",
              actions: assign({ output: ({ event }) => event.output.content ?? "" }),
            },
          ],
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => classifyModelError(event.error) }),
          },
        },
      },
      dispatchingTools: {
        invoke: {
          id: "tools",
          src: "dispatchTools",
          input: ({ context }) => ({ calls: context.pendingToolCalls }),
          onDone: {
            target: "checking",
            actions: assign({
              toolCallCount: ({ context, event }) => context.toolCallCount + event.output.length,
              pendingToolCalls: () => [],
            }),
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toStructuredError(event.error) }),
          },
        },
      },
      done: { type: "final" },
      failed: { type: "final" },
    },
    output: ({ context }) => ({
      success: context.error === null,
      output: context.output,
      error: context.error,
      iterations: context.iterations,
      toolCalls: context.toolCallCount,
    }),
  });
}

// 瞬时错误在重试耗尽后才会到达这里
export function classifyModelError(error: unknown): StructuredError {
  if (error instanceof TransientProviderError) {
    return new ExecutionFailure(
      `Model call failed after retries: ${error.message}`,
      { cause: error, details: { status: error.status } }
    ).toJSON();
  }
  if (error instanceof OrchestratorError) {
    return error.toJSON();
  }
  return toStructuredError(error);
}
