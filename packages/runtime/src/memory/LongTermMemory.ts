import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { RunRecordSchema } from '../types/index.js';
import type { RunRecord } from '../types/index.js';

export interface LearningEntry {
  key: string;
  value: unknown;
  recordedAt: number;
}

/**
 * 跨运行保存的长期记忆：运行记录只追加，按 runId 取最新一条。
 */
export interface LongTermMemory {
  append(record: RunRecord): Promise<void>;
  get(runId: string): Promise<RunRecord | null>;
  /** 最近的运行记录，新的在前 */
  recent(limit: number): Promise<RunRecord[]>;
  addLearning(key: string, value: unknown): Promise<void>;
  getLearning(key: string): Promise<unknown>;
}

export class InMemoryLongTermMemory implements LongTermMemory {
  private records: RunRecord[] = [];

  private learnings = new Map<string, LearningEntry>();

  public async append(record: RunRecord): Promise<void> {
    this.records.push(structuredClone(record));
  }

  public async get(runId: string): Promise<RunRecord | null> {
    return latestFor(this.records, runId);
  }

  public async recent(limit: number): Promise<RunRecord[]> {
    return newestFirst(this.records, limit);
  }

  public async addLearning(key: string, value: unknown): Promise<void> {
    this.learnings.set(key, { key, value, recordedAt: Date.now() });
  }

  public async getLearning(key: string): Promise<unknown> {
    return this.learnings.get(key)?.value ?? null;
  }
}

const JsonlLineSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('run'), record: RunRecordSchema }),
  z.object({
    kind: z.literal('learning'),
    key: z.string(),
    value: z.unknown(),
    recordedAt: z.number(),
  }),
]);

type JsonlLine = z.infer<typeof JsonlLineSchema>;

/**
 * 以 JSON Lines 文件持久化的长期记忆，每条记录一行。
 * 读取时逐行用 zod 校验，损坏的行会被跳过并告警。
 */
export class JsonlLongTermMemory implements LongTermMemory {
  constructor(private readonly filePath: string) {}

  public async append(record: RunRecord): Promise<void> {
    await this.writeLine({ kind: 'run', record });
  }

  public async get(runId: string): Promise<RunRecord | null> {
    return latestFor(await this.readRuns(), runId);
  }

  public async recent(limit: number): Promise<RunRecord[]> {
    return newestFirst(await this.readRuns(), limit);
  }

  public async addLearning(key: string, value: unknown): Promise<void> {
    await this.writeLine({ kind: 'learning', key, value, recordedAt: Date.now() });
  }

  public async getLearning(key: string): Promise<unknown> {
    const lines = await this.readLines();
    let found: unknown = null;
    lines.forEach((line) => {
      if (line.kind === 'learning' && line.key === key) {
        found = line.value;
      }
    });
    return found;
  }

  private async writeLine(line: JsonlLine): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(line)}\n`, 'utf8');
  }

  private async readRuns(): Promise<RunRecord[]> {
    const lines = await this.readLines();
    return lines.flatMap((line) => (line.kind === 'run' ? [line.record] : []));
  }

  private async readLines(): Promise<JsonlLine[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const lines: JsonlLine[] = [];
    text.split('\n').forEach((rawLine, index) => {
      const trimmed = rawLine.trim();
      if (!trimmed) {
        return;
      }
      let json: unknown;
      try {
        json = JSON.parse(trimmed);
      } catch (error) {
        console.warn(`[LongTermMemory] Skipping unparsable line ${index + 1} in ${this.filePath}`, error);
        return;
      }
      const parsed = JsonlLineSchema.safeParse(json);
      if (!parsed.success) {
        console.warn(
          `[LongTermMemory] Skipping invalid line ${index + 1} in ${this.filePath}`,
          parsed.error.issues[0]?.message
        );
        return;
      }
      lines.push(parsed.data);
    });
    return lines;
  }
}

function latestFor(records: RunRecord[], runId: string): RunRecord | null {
  for (let i = records.length - 1; i >= 0; i -= 1) {
    if (records[i].runId === runId) {
      return structuredClone(records[i]);
    }
  }
  return null;
}

function newestFirst(records: RunRecord[], limit: number): RunRecord[] {
  if (limit <= 0) {
    return [];
  }
  return records
    .slice(-limit)
    .reverse()
    .map((record) => structuredClone(record));
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
