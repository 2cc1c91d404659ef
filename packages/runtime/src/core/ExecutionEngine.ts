import { nanoid } from "nanoid";
import { createActor } from "xstate";
import { z } from "zod";
// 执行引擎：驱动“模型 → 工具 → 模型”的有界循环，并在事件流上广播请求/结果
import type { OrchestratorConfig } from "../config/index.js";
import { ToolExecutionError, toErrorMessage, toStructuredError } from "../errors/index.js";
import type { StructuredError } from "../errors/index.js";
import type { StreamBus } from "../event/StreamBus.js";
import { createExecutionMachine } from "../fsm/executionMachine.js";
import type { ExecutionMachineOutput } from "../fsm/executionMachine.js";
import type { IdentifiedToolCall, ModelTurn } from "../fsm/executionTypes.js";
import { withRetry } from "../llm/retry.js";
import type { CompletionClient, ToolCallRequest } from "../llm/types.js";
import type { WorkingMemory } from "../memory/WorkingMemory.js";
import { isRecord, validateToolArguments } from "../registry/argumentValidation.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type { SubTask, ToolInvocation, ToolOutcome } from "../types/index.js";

export interface ExecutionEngineOptions {
  completion: CompletionClient;
  toolRegistry: ToolRegistry;
  config: OrchestratorConfig;
  systemPrompt?: string;
}

/** 一次执行所需的运行期依赖，RunContext 满足该结构 */
export interface ExecutionScope {
  memory: WorkingMemory;
  stream?: StreamBus;
  signal?: AbortSignal;
}

export interface ExecutionResult extends ExecutionMachineOutput {
  invocations: ToolInvocation[];
}

export interface DependencyOutput {
  id: string;
  output: string | null;
}

const defaultSystemPrompt = (agentName: string) => [
  `You are ${agentName}, the execution component of a task-orchestration agent.`,
  "Complete the task you are given. Call the available tools when they help; each tool result is returned to you as JSON.",
  "When the task is done, reply with the final answer and do not call any more tools.",
].join("\n");

const ToolOutcomeSchema = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), result: z.unknown() }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

export class ExecutionEngine {
  private readonly completion: CompletionClient;

  private readonly toolRegistry: ToolRegistry;

  private readonly config: OrchestratorConfig;

  private readonly systemPrompt: string;

  constructor(options: ExecutionEngineOptions) {
    this.completion = options.completion;
    this.toolRegistry = options.toolRegistry;
    this.config = options.config;
    this.systemPrompt = options.systemPrompt ?? defaultSystemPrompt(options.config.agent.name);
  }

  /**
   * 执行一个子任务：把描述、规划理由以及前置子任务的输出交给执行循环。
   */
  public async executeSubtask(
    subtask: SubTask,
    scope: ExecutionScope,
    dependencyOutputs: DependencyOutput[] = []
  ): Promise<ExecutionResult> {
    const lines = [`Subtask [${subtask.id}]: ${subtask.description}`];
    if (subtask.reasoning) {
      lines.push(`Why: ${subtask.reasoning}`);
    }
    if (dependencyOutputs.length > 0) {
      lines.push("Results of prerequisite subtasks:");
      dependencyOutputs.forEach((dependency) => {
        lines.push(`- [${dependency.id}] ${dependency.output ?? "(no output)"}`);
      });
    }
    return this.run(lines.join("\n"), scope, subtask.id);
  }

  /**
   * 不经规划直接执行一个任务。
   */
  public async execute(task: string, scope: ExecutionScope): Promise<ExecutionResult> {
    return this.run(task, scope, null);
  }

  private async run(
    task: string,
    scope: ExecutionScope,
    subtaskId: string | null
  ): Promise<ExecutionResult> {
    const invocations: ToolInvocation[] = [];
    const { memory, stream, signal } = scope;
    const maxIterations = this.config.agent.maxIterations;

    try {
      if (!memory.hasSystemMessage()) {
        memory.addSystem(this.systemPrompt);
      }
      memory.setTask(task);

      const machine = createExecutionMachine({
        isCancelled: () => signal?.aborted === true,
        callModel: async (iteration) => {
          stream?.emitExecution(`Model call ${iteration}/${maxIterations}`, {
            iteration,
            maxIterations,
            subtaskId,
          });
          const response = await withRetry(
            () =>
              this.completion.complete({
                messages: memory.messages(),
                tools: this.toolRegistry.toSchemas(),
                temperature: this.config.llm.temperature,
                maxTokens: this.config.llm.maxTokens,
                purpose: "execution",
                signal,
              }),
            this.config.llm.retry,
            { signal, label: "[ExecutionEngine]" }
          );
          const turn: ModelTurn = {
            content: response.content,
            toolCalls: response.toolCalls.map((call) => ({
              ...call,
              id: call.id ?? `call_${nanoid(8)}`,
            })),
          };
          memory.add({
            role: "assistant",
            content: turn.content ?? "",
            ...(turn.toolCalls.length > 0 ? { toolCalls: turn.toolCalls } : {}),
          });
          return turn;
        },
        dispatchTools: async (calls) => {
          const batch: ToolInvocation[] = [];
          for (const call of calls) {
            const invocation = await this.invokeTool(call, stream, subtaskId);
            memory.add({
              role: "tool",
              name: invocation.toolName,
              toolCallId: invocation.id,
              content: JSON.stringify({
                tool_name: invocation.toolName,
                arguments: invocation.arguments,
                outcome: invocation.outcome,
              }),
            });
            batch.push(invocation);
            invocations.push(invocation);
          }
          return batch;
        },
      });

      const actor = createActor(machine, { input: { maxIterations } });
      const output = await new Promise<ExecutionMachineOutput>((resolve, reject) => {
        const subscription = actor.subscribe({
          next: (snapshot) => {
            if (snapshot.status === "done") {
              subscription.unsubscribe();
              resolve(snapshot.output);
            }
          },
          error: (error) => {
            subscription.unsubscribe();
            reject(error);
          },
        });

        try {
          actor.start();
        } catch (error) {
          subscription.unsubscribe();
          reject(error);
        }
      });

      if (!output.success && output.error) {
        console.warn(
          `[ExecutionEngine] Task ${subtaskId ?? "(direct)"} failed (${output.error.kind}): ${output.error.message}`
        );
      }
      return { ...output, invocations };
    } catch (error) {
      const structured: StructuredError = toStructuredError(error);
      console.error("[ExecutionEngine] Unexpected execution fault", error);
      return {
        success: false,
        output: null,
        error: structured,
        iterations: 0,
        toolCalls: invocations.length,
        invocations,
      };
    }
  }

  private async invokeTool(
    call: IdentifiedToolCall,
    stream: StreamBus | undefined,
    subtaskId: string | null
  ): Promise<ToolInvocation> {
    const startedAt = Date.now();
    stream?.emitToolCall("request", {
      id: call.id,
      toolName: call.name,
      arguments: call.arguments,
      subtaskId,
    });

    const { args, outcome } = await this.resolveOutcome(call);
    const invocation: ToolInvocation = {
      id: call.id,
      toolName: call.name,
      arguments: args,
      outcome,
      latencyMs: Date.now() - startedAt,
    };

    stream?.emitToolCall("result", {
      id: invocation.id,
      toolName: invocation.toolName,
      outcome: invocation.outcome,
      latencyMs: invocation.latencyMs,
      subtaskId,
    });
    return invocation;
  }

  private async resolveOutcome(
    call: ToolCallRequest
  ): Promise<{ args: unknown; outcome: ToolOutcome }> {
    const tool = this.toolRegistry.get(call.name);
    if (!tool) {
      return {
        args: call.arguments,
        outcome: { success: false, error: `Tool '${call.name}' not found` },
      };
    }

    const parsed = parseArguments(call.arguments);
    if (!parsed.ok) {
      return {
        args: call.arguments,
        outcome: {
          success: false,
          error: `Invalid JSON arguments for tool '${call.name}': ${parsed.error}`,
        },
      };
    }

    const validationError = validateToolArguments(parsed.value, tool.parameterSchema);
    if (validationError || !isRecord(parsed.value)) {
      return {
        args: parsed.value,
        outcome: {
          success: false,
          error: `Invalid arguments for tool '${call.name}': ${
            validationError ?? "Arguments must be an object"
          }`,
        },
      };
    }

    const args = parsed.value;
    try {
      const raw: unknown = await tool.execute(args);
      const checked = ToolOutcomeSchema.safeParse(raw);
      if (!checked.success) {
        return {
          args,
          outcome: {
            success: false,
            error: `Tool '${call.name}' returned a malformed outcome`,
          },
        };
      }
      const outcome: ToolOutcome = checked.data.success
        ? { success: true, result: checked.data.result }
        : { success: false, error: checked.data.error };
      return { args, outcome };
    } catch (error) {
      const failure = new ToolExecutionError(
        call.name,
        `Tool '${call.name}' failed: ${toErrorMessage(error)}`,
        { cause: error }
      );
      console.warn(`[ExecutionEngine] ${failure.message}`);
      return { args, outcome: { success: false, error: failure.message } };
    }
  }
}

function parseArguments(
  raw: unknown
): { ok: true; value: unknown } | { ok: false; error: string } {
  if (raw === undefined || raw === null) {
    return { ok: true, value: {} };
  }
  if (typeof raw !== "string") {
    return { ok: true, value: raw };
  }
  if (raw.trim() === "") {
    return { ok: true, value: {} };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, error: toErrorMessage(error) };
  }
}
