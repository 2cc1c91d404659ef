import type { Tool, ToolOutcome, ToolParameterSchema } from '../types/index.js';

export class EchoTool implements Tool {
  public name = 'echo';

  public description = 'Echoes the provided message back, useful for relaying intermediate notes';

  public parameterSchema: ToolParameterSchema = {
    type: 'object',
    properties: {
      message: { type: 'string', description: 'Text to echo back' },
    },
    required: ['message'],
  };

  public async execute(args: Record<string, unknown>): Promise<ToolOutcome> {
    return {
      success: true,
      result: {
        message: `Echo: ${String(args.message)}`,
      },
    };
  }
}
