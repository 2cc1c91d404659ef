export type JsonPayloadResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

/**
 * 从模型回复中提取 JSON：支持 ```json 围栏，失败时尝试修复字符串内的
 * 裸换行与未转义引号后再解析一次。
 */
export function parseModelJson(content: string, label: string): JsonPayloadResult {
  const jsonText = extractJsonPayload(content);
  try {
    return { ok: true, value: JSON.parse(jsonText) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const position = extractJsonErrorPosition(message);
    console.warn(`${label} Failed to parse LLM JSON`, {
      error: message,
      preview: truncate(jsonText, 2_000),
      problemSnippet: position ? getProblemSnippet(jsonText, position) : undefined,
    });
  }

  try {
    const value: unknown = JSON.parse(sanitizeJsonStrings(jsonText));
    console.info(`${label} Successfully sanitized LLM JSON`);
    return { ok: true, value };
  } catch (repairError) {
    const repairMessage =
      repairError instanceof Error ? repairError.message : String(repairError);
    console.warn(`${label} JSON sanitization failed`, { error: repairMessage });
    return { ok: false, error: repairMessage };
  }
}

export function extractJsonPayload(content: string): string {
  const fenced = content.match(/```json\s*([\s\S]+?)```/i);
  if (fenced) {
    return fenced[1].trim();
  }
  const altFence = content.match(/```([\s\S]+?)```/);
  if (altFence) {
    return altFence[1].trim();
  }
  return content.trim();
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}…`;
}

export function sanitizeJsonStrings(input: string): string {
  let result = "";
  let inString = false;
  let escapeNext = false;
  for (let i = 0; i < input.length; i += 1) {
    const char = input[i];
    if (escapeNext) {
      result += char;
      escapeNext = false;
      continue;
    }
    if (char === "\\") {
      escapeNext = true;
      result += char;
      continue;
    }
    if (char === '"') {
      if (!inString) {
        inString = true;
        result += char;
        continue;
      }
      // 字符串内部出现的引号：后面不是结构符号时视为内容
      const next = findNextSignificantChar(input, i + 1);
      if (next && !",:}]".includes(next)) {
        result += '\\"';
        continue;
      }
      inString = false;
      result += char;
      continue;
    }
    if (inString) {
      if (char === "\n") {
        result += "\\n";
        continue;
      }
      if (char === "\r") {
        result += "\\r";
        continue;
      }
      if (char === "\t") {
        result += "\\t";
        continue;
      }
    }
    result += char;
  }
  return result;
}

function extractJsonErrorPosition(message: string): number | null {
  const match = message.match(/position\s+(\d+)/i);
  if (!match) {
    return null;
  }
  const value = Number.parseInt(match[1], 10);
  return Number.isNaN(value) ? null : value;
}

function getProblemSnippet(value: string, position: number): string {
  const start = Math.max(0, position - 120);
  const end = Math.min(value.length, position + 120);
  return value.slice(start, end);
}

function findNextSignificantChar(input: string, startIndex: number): string | null {
  for (let i = startIndex; i < input.length; i += 1) {
    const char = input[i];
    if (!/\s/.test(char)) {
      return char;
    }
  }
  return null;
}
