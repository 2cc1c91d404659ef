export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  /** 模型给出的调用 ID，缺失时由执行引擎补齐 */
  id?: string;
  name: string;
  /** 原始参数：可能是 JSON 字符串，也可能已经是对象 */
  arguments: unknown;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** assistant 消息携带的工具调用 */
  toolCalls?: ToolCallRequest[];
  /** tool 消息对应的调用 ID */
  toolCallId?: string;
  name?: string;
}

export type CompletionPurpose =
  | 'planning'
  | 'execution'
  | 'evaluation'
  | 'thinking'
  | 'classification';

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface CompletionRequest {
  messages: ChatMessage[];
  tools?: ToolSchema[];
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json_object';
  /** 调用目的，便于日志与测试桩路由 */
  purpose?: CompletionPurpose;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  content: string | null;
  toolCalls: ToolCallRequest[];
}

/**
 * 语言模型能力的最小契约。
 * 可重试的失败抛出 TransientProviderError，其余抛出 FatalProviderError。
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
