import { z } from "zod";
import { toErrorMessage } from "../errors/index.js";
import { parseModelJson } from "../llm/json.js";
import type { CompletionClient } from "../llm/types.js";

export type QueryType = "greeting" | "simple_question" | "complex_task" | "clarification";

export type ResponseStrategy = "direct_response" | "quick_answer" | "full_planning" | "context_aware";

export interface QueryClassification {
  type: QueryType;
  confidence: number;
  useFullWorkflow: boolean;
  reasoning: string;
  strategy: ResponseStrategy;
}

export interface QueryClassifierOptions {
  completion?: CompletionClient;
  /** 自定义分类提示，{query} 会被替换为用户输入 */
  prompt?: string;
}

const STRATEGIES: Record<QueryType, ResponseStrategy> = {
  greeting: "direct_response",
  simple_question: "quick_answer",
  complex_task: "full_planning",
  clarification: "context_aware",
};

const GREETING_WORDS = ["hello", "hi", "hey", "你好", "您好", "hola", "bonjour"];

const DEFAULT_PROMPT = `You are a query classifier for an AI agent system. Analyze the user's query and classify it into one of these categories:

1. GREETING - Simple greetings, small talk (e.g., "hello", "how are you")
2. SIMPLE_QUESTION - Single factual questions, definitions (e.g., "What is TypeScript?")
3. COMPLEX_TASK - Multi-step tasks requiring planning and execution (e.g., "Analyze data and generate report")
4. CLARIFICATION - User clarifying or confirming something

User Query: "{query}"

Respond ONLY with a JSON object in this exact format:
{
    "type": "GREETING|SIMPLE_QUESTION|COMPLEX_TASK|CLARIFICATION",
    "confidence": 0.0-1.0,
    "reasoning": "brief explanation",
    "use_full_workflow": true|false
}`;

const ClassificationReplySchema = z.object({
  type: z.string().optional(),
  confidence: z.number().optional(),
  reasoning: z.string().optional(),
  use_full_workflow: z.boolean().optional(),
});

/**
 * 判断用户输入需要多重的处理：问候直接回复，复杂任务走完整规划流程。
 */
export class QueryClassifier {
  private readonly completion: CompletionClient | undefined;

  private readonly prompt: string;

  constructor(options: QueryClassifierOptions = {}) {
    this.completion = options.completion;
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
  }

  public async classify(query: string, signal?: AbortSignal): Promise<QueryClassification> {
    if (!this.completion) {
      return fallbackClassification(query);
    }

    try {
      const response = await this.completion.complete({
        messages: [{ role: "user", content: this.prompt.replace("{query}", query) }],
        temperature: 0.1,
        maxTokens: 200,
        purpose: "classification",
        signal,
      });
      const parsedJson = parseModelJson(response.content ?? "", "[QueryClassifier]");
      if (!parsedJson.ok) {
        return fallbackClassification(query);
      }
      const parsed = ClassificationReplySchema.safeParse(parsedJson.value);
      if (!parsed.success) {
        console.warn("[QueryClassifier] Classification reply has unexpected shape, using fallback");
        return fallbackClassification(query);
      }
      const type = toQueryType(parsed.data.type);
      return {
        type,
        confidence: Math.min(1, Math.max(0, parsed.data.confidence ?? 0.8)),
        useFullWorkflow: parsed.data.use_full_workflow ?? true,
        reasoning: parsed.data.reasoning ?? "",
        strategy: STRATEGIES[type],
      };
    } catch (error) {
      console.warn(`[QueryClassifier] Classification failed (${toErrorMessage(error)}), using fallback`);
      return fallbackClassification(query);
    }
  }

  /** 问候类输入的固定回复；其他类型返回 null */
  public quickResponse(query: string, classification: QueryClassification): string | null {
    if (classification.type !== "greeting") {
      return null;
    }
    if (["你好", "您好", "嗨"].some((word) => query.includes(word))) {
      return "你好！我可以帮你规划并执行多步骤任务，有什么需要吗？";
    }
    return "Hello! I can plan and carry out multi-step tasks for you. What can I help you with today?";
  }
}

export function fallbackClassification(query: string): QueryClassification {
  const lowered = query.toLowerCase().trim();
  const wordCount = query.trim().split(/\s+/).filter(Boolean).length;
  if (GREETING_WORDS.some((word) => lowered.includes(word)) && wordCount <= 3) {
    return {
      type: "greeting",
      confidence: 0.9,
      useFullWorkflow: false,
      reasoning: "Simple greeting detected",
      strategy: STRATEGIES.greeting,
    };
  }
  return {
    type: "complex_task",
    confidence: 0.6,
    useFullWorkflow: true,
    reasoning: "Default to full workflow",
    strategy: STRATEGIES.complex_task,
  };
}

function toQueryType(raw: string | undefined): QueryType {
  switch ((raw ?? "").trim().toUpperCase()) {
    case "GREETING":
      return "greeting";
    case "SIMPLE_QUESTION":
      return "simple_question";
    case "CLARIFICATION":
      return "clarification";
    default:
      return "complex_task";
  }
}
