import { z } from "zod";
import {
  CancelledError,
  FatalProviderError,
  TransientProviderError,
  toErrorMessage,
} from "../errors/index.js";
import type {
  ChatMessage,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  ToolCallRequest,
} from "./types.js";

export type ChatModelProvider = "openai" | "deepseek";

export interface ChatModelClientOptions {
  provider?: ChatModelProvider;
  apiKey?: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
  /** 读取默认值的环境变量来源，默认 process.env */
  env?: Record<string, string | undefined>;
}

interface ProviderDefaults {
  apiKeyEnv: string;
  baseUrlEnv: string;
  modelEnv: string;
  baseURL: string;
  model: string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string().optional(),
                  function: z.object({
                    name: z.string(),
                    arguments: z.unknown(),
                  }),
                })
              )
              .optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

const PROVIDER_DEFAULTS: Record<ChatModelProvider, ProviderDefaults> = {
  openai: {
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    modelEnv: "OPENAI_MODEL",
    baseURL: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  deepseek: {
    apiKeyEnv: "DEEPSEEK_API_KEY",
    baseUrlEnv: "DEEPSEEK_BASE_URL",
    modelEnv: "DEEPSEEK_MODEL",
    baseURL: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
};

const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export class ChatModelClient implements CompletionClient {
  private readonly provider: ChatModelProvider;

  private readonly apiKey: string | null;

  private readonly endpoint: string;

  private readonly model: string;

  private readonly requestTimeoutMs: number;

  private readonly headers: Record<string, string>;

  constructor(options?: ChatModelClientOptions) {
    const env = options?.env ?? process.env;
    this.provider = resolveProvider(options, env);
    const defaults = PROVIDER_DEFAULTS[this.provider];

    const resolvedApiKey = options?.apiKey ?? env[defaults.apiKeyEnv] ?? null;
    this.apiKey =
      typeof resolvedApiKey === "string" && resolvedApiKey.length > 0
        ? resolvedApiKey
        : null;

    const baseURL =
      options?.baseURL ?? env[defaults.baseUrlEnv] ?? defaults.baseURL;

    this.endpoint = `${stripTrailingSlash(baseURL)}/chat/completions`;

    this.model = options?.model ?? env[defaults.modelEnv] ?? defaults.model;

    this.requestTimeoutMs =
      typeof options?.requestTimeoutMs === "number"
        ? options.requestTimeoutMs
        : DEFAULT_REQUEST_TIMEOUT_MS;

    this.headers = {
      "Content-Type": "application/json",
      ...(options?.headers ?? {}),
    };

    const headerKeys = Object.keys(options?.headers ?? {});
    console.info("[ChatModelClient] Initialized", {
      provider: this.provider,
      baseURL,
      model: this.model,
      requestTimeoutMs: this.requestTimeoutMs,
      hasApiKey: Boolean(this.apiKey),
      customHeaderKeys: headerKeys.length > 0 ? headerKeys : undefined,
    });
  }

  public getProvider(): ChatModelProvider {
    return this.provider;
  }

  public getEndpoint(): string {
    return this.endpoint;
  }

  public isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.apiKey) {
      throw new FatalProviderError(
        `ChatModelClient (${this.provider}) is not configured with an API key`
      );
    }

    if (request.signal?.aborted) {
      throw new CancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const body: Record<string, unknown> = {
        model: this.model,
        temperature: request.temperature ?? 0.7,
        max_tokens: request.maxTokens ?? 4096,
        messages: request.messages.map(toWireMessage),
      };

      if (request.tools && request.tools.length > 0) {
        body.tools = request.tools;
      }

      if (request.responseFormat === "json_object") {
        body.response_format = { type: "json_object" };
      }

      console.info("[ChatModelClient] Request", {
        provider: this.provider,
        purpose: request.purpose ?? "unspecified",
        messages: request.messages.length,
        tools: request.tools?.length ?? 0,
      });

      let response: Response;
      try {
        response = await fetch(this.endpoint, {
          method: "POST",
          headers: {
            ...this.headers,
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut) {
          throw new TransientProviderError(
            `${capitalize(this.provider)} request timed out after ${this.requestTimeoutMs}ms`,
            { cause: error }
          );
        }
        if (request.signal?.aborted) {
          throw new CancelledError();
        }
        throw new TransientProviderError(
          `${capitalize(this.provider)} request failed: ${toErrorMessage(error)}`,
          { cause: error }
        );
      }

      if (!response.ok) {
        const errText = await response.text().catch((error: unknown) => {
          console.warn("[ChatModelClient] Failed to read error body", error);
          return "";
        });
        const message = `${capitalize(this.provider)} request failed with status ${
          response.status
        } ${response.statusText}${errText ? `: ${errText}` : ""}`;
        if (isTransientStatus(response.status)) {
          throw new TransientProviderError(message, { status: response.status });
        }
        throw new FatalProviderError(message, { status: response.status });
      }

      const raw: unknown = await response.json().catch((error: unknown) => {
        throw new TransientProviderError(
          `${capitalize(this.provider)} response was not valid JSON`,
          { cause: error }
        );
      });
      const parsed = ChatCompletionResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new FatalProviderError(
          `${capitalize(this.provider)} response has an unexpected shape`,
          { cause: parsed.error }
        );
      }

      const message = parsed.data.choices?.[0]?.message;
      const content = message?.content?.trim() ?? "";
      const toolCalls: ToolCallRequest[] = (message?.tool_calls ?? []).map(
        (call) => ({
          ...(call.id ? { id: call.id } : {}),
          name: call.function.name,
          arguments: call.function.arguments,
        })
      );

      if (!content && toolCalls.length === 0) {
        throw new FatalProviderError(
          `${capitalize(
            this.provider
          )} response did not contain any message content`
        );
      }

      return { content: content || null, toolCalls };
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  if (message.role === "tool") {
    return {
      role: "tool",
      content: message.content,
      tool_call_id: message.toolCallId,
    };
  }
  if (message.role === "assistant" && message.toolCalls?.length) {
    return {
      role: "assistant",
      content: message.content,
      tool_calls: message.toolCalls.map((call) => ({
        id: call.id,
        type: "function",
        function: {
          name: call.name,
          arguments:
            typeof call.arguments === "string"
              ? call.arguments
              : JSON.stringify(call.arguments ?? {}),
        },
      })),
    };
  }
  return { role: message.role, content: message.content };
}

function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

function resolveProvider(
  options: ChatModelClientOptions | undefined,
  env: Record<string, string | undefined>
): ChatModelProvider {
  if (options?.provider) {
    return options.provider;
  }

  const envProvider = (env.LLM_PROVIDER ?? "").toLowerCase();
  if (envProvider === "openai" || envProvider === "deepseek") {
    return envProvider;
  }

  const preferredProviders: ChatModelProvider[] = ["openai", "deepseek"];

  for (const provider of preferredProviders) {
    const keyEnv = PROVIDER_DEFAULTS[provider].apiKeyEnv;
    if (env[keyEnv]) {
      return provider;
    }
  }

  return "openai";
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1);
}
