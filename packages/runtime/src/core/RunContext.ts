import { nanoid } from 'nanoid';
import type { OrchestratorConfig } from '../config/index.js';
import { StreamBus } from '../event/StreamBus.js';
import type { CompletionClient } from '../llm/types.js';
import { WorkingMemory } from '../memory/WorkingMemory.js';
import { ThinkingEngine } from '../thinking/ThinkingEngine.js';
import type { AgentMessage, AgentRole, Plan } from '../types/index.js';

export interface RunContextOptions {
  goal: string;
  config: OrchestratorConfig;
  completion: CompletionClient;
  runId?: string;
  stream?: StreamBus;
  signal?: AbortSignal;
}

/**
 * 单次运行的依赖与状态集合：每次 run 新建一个，结束后丢弃。
 * 工作记忆、事件流、思考记录与角色消息记录都只属于这一次运行。
 */
export class RunContext {
  public readonly runId: string;

  public readonly goal: string;

  public readonly memory: WorkingMemory;

  public readonly stream: StreamBus;

  public readonly thinking: ThinkingEngine;

  public readonly signal: AbortSignal | undefined;

  private plan: Plan | null = null;

  private transcript: AgentMessage[] = [];

  constructor(options: RunContextOptions) {
    this.runId = options.runId ?? nanoid();
    this.goal = options.goal;
    this.signal = options.signal;
    this.memory = new WorkingMemory(options.config.memory.maxWorkingMessages);
    this.stream =
      options.stream ??
      new StreamBus({
        runId: this.runId,
        subscriberQueueLimit: options.config.stream.subscriberQueueLimit,
        historyLimit: options.config.stream.historyLimit,
      });
    this.thinking = new ThinkingEngine({
      completion: options.completion,
      enabled: options.config.agent.thinkingEnabled,
      temperature: options.config.llm.temperature,
      stream: this.stream,
      signal: options.signal,
    });
  }

  public isCancelled(): boolean {
    return this.signal?.aborted === true;
  }

  public getPlan(): Plan | null {
    return this.plan;
  }

  // 计划整体替换（重规划时）
  public setPlan(plan: Plan | null): void {
    this.plan = plan;
  }

  // 追加一条角色间消息
  public addMessage(
    sender: AgentRole,
    recipient: AgentRole | 'all',
    content: string,
    metadata: Record<string, unknown> = {}
  ): AgentMessage {
    const message: AgentMessage = {
      sender,
      recipient,
      content,
      metadata,
      timestamp: Date.now(),
    };
    this.transcript = [...this.transcript, message];
    return message;
  }

  // 返回深拷贝，调用方无法改动运行内的消息记录
  public getTranscript(): AgentMessage[] {
    return structuredClone(this.transcript);
  }
}
