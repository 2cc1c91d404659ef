import { nanoid } from "nanoid";
import { toErrorMessage } from "../errors/index.js";
import type { StreamBus } from "../event/StreamBus.js";
import { truncate } from "../llm/json.js";
import type { CompletionClient } from "../llm/types.js";
import type { ThoughtKind, ThoughtRecord } from "../types/index.js";

export interface ThinkingEngineOptions {
  completion: CompletionClient;
  enabled?: boolean;
  temperature?: number;
  maxTokens?: number;
  stream?: StreamBus;
  signal?: AbortSignal;
}

const KIND_PROMPTS: Record<ThoughtKind, string> = {
  reasoning:
    "You are thinking through a problem step by step. Analyze the situation logically and explain your reasoning.",
  reflection:
    "You are reflecting on what has happened. Consider what went well, what didn't, and what can be learned.",
  decision:
    "You are making a decision. Consider the options, their pros and cons, and choose the best path forward.",
  observation:
    "You are observing the current state. What do you notice? What is important?",
};

/**
 * 单次运行的显式推理记录器。
 * 思考结果只做记录与广播，不影响控制流；失败时返回 null。
 */
export class ThinkingEngine {
  private readonly completion: CompletionClient;

  private readonly enabled: boolean;

  private readonly temperature: number;

  private readonly maxTokens: number | undefined;

  private readonly stream: StreamBus | undefined;

  private readonly signal: AbortSignal | undefined;

  private records: ThoughtRecord[] = [];

  constructor(options: ThinkingEngineOptions) {
    this.completion = options.completion;
    this.enabled = options.enabled ?? true;
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens;
    this.stream = options.stream;
    this.signal = options.signal;
  }

  public async think(
    context: string,
    question: string,
    kind: ThoughtKind = "reasoning",
    subtaskId: string | null = null
  ): Promise<ThoughtRecord | null> {
    if (!this.enabled || this.signal?.aborted) {
      return null;
    }

    let content: string;
    try {
      const response = await this.completion.complete({
        messages: [
          {
            role: "system",
            content: `${KIND_PROMPTS[kind]}\n\nThink aloud and be explicit about your reasoning process.`,
          },
          { role: "user", content: `Context: ${context}\n\nQuestion: ${question}` },
        ],
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        purpose: "thinking",
        signal: this.signal,
      });
      content = (response.content ?? "").trim();
    } catch (error) {
      console.warn(`[ThinkingEngine] ${kind} thought failed (${toErrorMessage(error)})`);
      return null;
    }

    if (!content) {
      return null;
    }

    const record: ThoughtRecord = {
      id: nanoid(10),
      kind,
      content,
      subtaskId,
      timestamp: Date.now(),
    };
    this.records.push(record);
    this.stream?.emitThinking(kind, content, subtaskId);
    return record;
  }

  public observe(situation: string, subtaskId: string | null = null): Promise<ThoughtRecord | null> {
    return this.think(situation, "What do you notice? What matters for the next step?", "observation", subtaskId);
  }

  public reflectOnAction(
    action: string,
    result: unknown,
    expectedOutcome: string,
    subtaskId: string | null = null
  ): Promise<ThoughtRecord | null> {
    const context = [
      `Action taken: ${action}`,
      `Expected outcome: ${expectedOutcome}`,
      `Actual result: ${typeof result === "string" ? result : JSON.stringify(result)}`,
    ].join("\n");
    return this.think(
      context,
      "Did this action achieve what we wanted? What should we do next?",
      "reflection",
      subtaskId
    );
  }

  public analyzeFailure(
    task: string,
    error: string,
    attempts: number,
    subtaskId: string | null = null
  ): Promise<ThoughtRecord | null> {
    const context = [`Task: ${task}`, `Error: ${error}`, `Attempts made: ${attempts}`].join("\n");
    return this.think(
      context,
      "Why did this fail? What are the root causes? How can we fix it?",
      "reasoning",
      subtaskId
    );
  }

  public makeDecision(
    situation: string,
    options: string[],
    subtaskId: string | null = null
  ): Promise<ThoughtRecord | null> {
    const context = [
      `Situation: ${situation}`,
      "Available options:",
      ...options.map((option, index) => `${index + 1}. ${option}`),
    ].join("\n");
    return this.think(context, "Which option should we choose and why?", "decision", subtaskId);
  }

  public thoughts(): ThoughtRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  public summary(): string {
    if (this.records.length === 0) {
      return "No thoughts recorded yet.";
    }
    const lines = this.records.map(
      (record, index) => `${index + 1}. [${record.kind}] ${truncate(record.content, 100)}`
    );
    return `Thinking Process Summary:\n\n${lines.join("\n")}`;
  }

  public clear(): void {
    this.records = [];
  }
}
