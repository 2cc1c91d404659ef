import { ToolRegistrationError } from '../errors/index.js';
import type { ToolSchema } from '../llm/types.js';
import type { Tool } from '../types/index.js';

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_.-]{1,64}$/;

export interface ToolRegistry {
  get(name: string): Tool | undefined;
  list(): Tool[];
  toSchemas(): ToolSchema[];
}

/**
 * 启动阶段注册工具，seal 之后只读。
 * 注册时校验名称、描述与参数 schema，错误以 ToolRegistrationError 抛出。
 */
export class InMemoryToolRegistry implements ToolRegistry {
  private tools = new Map<string, Tool>();

  private sealed = false;

  constructor(tools: Tool[] = []) {
    tools.forEach((tool) => {
      this.register(tool);
    });
  }

  public register(tool: Tool): void {
    if (this.sealed) {
      throw new ToolRegistrationError(
        `Cannot register tool "${tool.name}": registry is sealed`
      );
    }
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolRegistrationError(
        `Invalid tool name "${tool.name}": use 1-64 letters, digits, "_", "." or "-"`
      );
    }
    if (tool.description.trim().length === 0) {
      throw new ToolRegistrationError(`Tool "${tool.name}" must have a description`);
    }
    if (tool.parameterSchema.type !== 'object') {
      throw new ToolRegistrationError(
        `Tool "${tool.name}" parameter schema must be of type "object"`
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  public seal(): this {
    this.sealed = true;
    return this;
  }

  public isSealed(): boolean {
    return this.sealed;
  }

  public get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  public list(): Tool[] {
    return Array.from(this.tools.values());
  }

  // OpenAI function-calling 格式的工具目录
  public toSchemas(): ToolSchema[] {
    return this.list().map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { ...tool.parameterSchema },
      },
    }));
  }
}
