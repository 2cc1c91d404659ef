import type { ChatMessage } from '../llm/types.js';

interface WorkingEntry {
  message: ChatMessage;
  pinned: boolean;
  /** 当前任务的说明消息 */
  task: boolean;
}

const DEFAULT_MAX_MESSAGES = 50;

/**
 * 单次运行的短期记忆：有序的对话消息。
 * 超出上限时从最旧的非固定消息开始裁剪；system 消息与当前任务说明始终保留。
 */
export class WorkingMemory {
  private entries: WorkingEntry[] = [];

  constructor(private readonly maxMessages: number = DEFAULT_MAX_MESSAGES) {}

  public add(message: ChatMessage): void {
    this.entries.push({ message: { ...message }, pinned: message.role === 'system', task: false });
    this.prune();
  }

  public addSystem(content: string): void {
    this.add({ role: 'system', content });
  }

  public addUser(content: string): void {
    this.add({ role: 'user', content });
  }

  /**
   * 设置当前任务说明。新任务固定，上一个任务说明解除固定，可以正常被裁剪。
   */
  public setTask(content: string): void {
    this.entries.forEach((entry) => {
      if (entry.task) {
        entry.task = false;
        entry.pinned = false;
      }
    });
    this.entries.push({ message: { role: 'user', content }, pinned: true, task: true });
    this.prune();
  }

  public messages(): ChatMessage[] {
    return this.entries.map((entry) => ({ ...entry.message }));
  }

  public get size(): number {
    return this.entries.length;
  }

  public hasSystemMessage(): boolean {
    return this.entries.some((entry) => entry.message.role === 'system');
  }

  public clear(): void {
    this.entries = [];
  }

  private prune(): void {
    while (this.entries.length > this.maxMessages) {
      const index = this.entries.findIndex((entry) => !entry.pinned);
      if (index === -1) {
        // 只剩固定消息时不再裁剪
        return;
      }
      const [removed] = this.entries.splice(index, 1);
      this.dropOrphanedToolResults(removed.message);
    }
  }

  // 裁掉带 toolCalls 的 assistant 消息后，对应的 tool 消息失去上下文
  private dropOrphanedToolResults(removed: ChatMessage): void {
    const callIds = new Set(
      (removed.toolCalls ?? [])
        .map((call) => call.id)
        .filter((id): id is string => typeof id === 'string')
    );
    if (callIds.size === 0) {
      return;
    }
    this.entries = this.entries.filter(
      (entry) =>
        entry.pinned ||
        entry.message.role !== 'tool' ||
        entry.message.toolCallId === undefined ||
        !callIds.has(entry.message.toolCallId)
    );
  }
}
