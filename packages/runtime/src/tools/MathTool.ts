import { evaluate } from 'mathjs';
import type { Tool, ToolOutcome, ToolParameterSchema } from '../types/index.js';

export class MathTool implements Tool {
  public name = 'math';

  public description =
    'Evaluates mathematical expressions. Provide an expression, e.g., "2 * (3 + 4)".';

  public parameterSchema: ToolParameterSchema = {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'Expression to evaluate' },
    },
    required: ['expression'],
  };

  public async execute(args: Record<string, unknown>): Promise<ToolOutcome> {
    const expression = String(args.expression ?? '').trim();

    if (!expression) {
      return {
        success: false,
        error: 'Missing expression parameter',
      };
    }

    try {
      const value: unknown = evaluate(expression);
      if (typeof value !== 'number' && typeof value !== 'boolean') {
        // 矩阵、单位等结果统一转为字符串
        return {
          success: true,
          result: { expression, result: String(value) },
        };
      }
      return {
        success: true,
        result: { expression, result: value },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        error: `Failed to evaluate expression: ${message}`,
      };
    }
  }
}
