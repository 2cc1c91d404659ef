export {
  AgentMessageSchema,
  AgentRoleSchema,
  FinalEvaluationSchema,
  PlanSchema,
  RunRecordSchema,
  RunStatusSchema,
  StepEvaluationSchema,
  StructuredErrorSchema,
  SubTaskResultSchema,
  SubTaskSchema,
  SubTaskStatusSchema,
  ThoughtKindSchema,
  ThoughtRecordSchema,
} from './plan.js';

export type {
  AgentMessage,
  AgentRole,
  FinalEvaluation,
  Plan,
  RunRecord,
  RunStatus,
  StepEvaluation,
  SubTask,
  SubTaskResult,
  SubTaskStatus,
  ThoughtKind,
  ThoughtRecord,
} from './plan.js';

export type JSONSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface JSONSchemaProperty {
  type?: JSONSchemaType;
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  oneOf?: JSONSchemaProperty[];
  default?: unknown;
  /** 嵌套对象的属性 */
  properties?: Record<string, JSONSchemaProperty>;
  /** 嵌套对象的必填字段 */
  required?: string[];
  /** 是否允许额外属性（默认允许） */
  additionalProperties?: boolean;
}

/** 工具参数的顶层 schema 必须是 object */
export interface ToolParameterSchema extends JSONSchemaProperty {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
}

export type ToolOutcome =
  | { success: true; result: unknown }
  | { success: false; error: string };

export interface Tool {
  /** 工具唯一名称，模型通过它发起调用 */
  name: string;
  /** 工具作用或使用方式的简短说明 */
  description: string;
  /** 参数的 JSON schema，用于提示模型与调用前校验 */
  parameterSchema: ToolParameterSchema;
  /** 执行工具主逻辑；失败时返回 success:false，而不是抛出 */
  execute(args: Record<string, unknown>): Promise<ToolOutcome>;
}

export interface ToolInvocation {
  /** 调用 ID，与 assistant 消息中的 toolCall 对应 */
  id: string;
  toolName: string;
  arguments: unknown;
  outcome: ToolOutcome;
  latencyMs: number;
}

export const STREAM_EVENT_TYPES = [
  'START',
  'PLANNING',
  'THINKING',
  'EXECUTION',
  'TOOL_CALL',
  'PROGRESS',
  'EVALUATION',
  'COMPLETE',
  'ERROR',
] as const;

export type StreamEventType = (typeof STREAM_EVENT_TYPES)[number];

export interface StreamEvent {
  type: StreamEventType; // 事件类型
  data: Record<string, unknown>; // 事件负载
  sequence: number; // 单次运行内的递增序号，从 0 开始
  timestamp: number; // 事件发生时间（毫秒时间戳）
}
