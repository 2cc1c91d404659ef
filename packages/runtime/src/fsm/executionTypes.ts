import type { StructuredError } from '../errors/index.js';
import type { CompletionResponse, ToolCallRequest } from '../llm/types.js';
import type { ToolInvocation } from '../types/index.js';

export interface ExecutionMachineContext {
  /** 已发起的模型调用次数 */
  iterations: number;
  /** 模型调用上限 */
  maxIterations: number;
  /** 累计的工具调用次数 */
  toolCallCount: number;
  /** 等待派发的工具调用（按模型返回顺序） */
  pendingToolCalls: IdentifiedToolCall[];
  /** 模型不再调用工具时给出的最终回答 */
  output: string | null;
  /** 进入 failed 时记录的结构化错误 */
  error: StructuredError | null;
}

export interface ExecutionMachineInput {
  maxIterations: number;
}

export interface ExecutionMachineOutput {
  success: boolean;
  output: string | null;
  error: StructuredError | null;
  iterations: number;
  toolCalls: number;
}

export type IdentifiedToolCall = ToolCallRequest & { id: string };

/** 模型调用返回时，所有工具调用都已补齐 id */
export interface ModelTurn extends CompletionResponse {
  toolCalls: IdentifiedToolCall[];
}

export interface ExecutionServices {
  callModel(iteration: number): Promise<ModelTurn>;
  dispatchTools(calls: IdentifiedToolCall[]): Promise<ToolInvocation[]>;
  isCancelled(): boolean;
}
