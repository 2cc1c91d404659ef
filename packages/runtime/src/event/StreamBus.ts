import { EventEmitter } from 'eventemitter3';
import { filter, Observable } from 'rxjs';
import { nanoid } from 'nanoid';
import type { StructuredError } from '../errors/index.js';
import type { StreamEvent, StreamEventType, ThoughtKind } from '../types/index.js';

export type StreamConsumer = (event: StreamEvent) => void | Promise<void>;

export interface StreamSubscribeOptions {
  /** 订阅时先补发已有的历史事件 */
  replay?: boolean;
  /** 该订阅者的队列上限，超出时丢弃最旧的未投递事件 */
  queueLimit?: number;
}

export interface StreamBusOptions {
  runId?: string;
  subscriberQueueLimit?: number;
  historyLimit?: number;
}

export type ToolCallPhase = 'request' | 'result';

const DEFAULT_QUEUE_LIMIT = 256;
const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * 单个订阅者的投递通道：独立的有界 FIFO，异步逐条投递。
 */
export class StreamSubscription {
  public readonly id = nanoid(8);

  private queue: StreamEvent[] = [];

  private draining = false;

  private scheduled = false;

  private closed = false;

  private droppedCount = 0;

  private deliveredCount = 0;

  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly consumer: StreamConsumer,
    private readonly queueLimit: number
  ) {}

  public get dropped(): number {
    return this.droppedCount;
  }

  public get delivered(): number {
    return this.deliveredCount;
  }

  public get pending(): number {
    return this.queue.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public push(event: StreamEvent): void {
    if (this.closed) {
      return;
    }
    this.queue.push(event);
    if (this.queue.length > this.queueLimit) {
      this.queue.shift();
      this.droppedCount += 1;
      if (this.droppedCount === 1 || this.droppedCount % 100 === 0) {
        console.warn(
          `[StreamBus] Subscriber ${this.id} is falling behind, dropped ${this.droppedCount} event(s)`
        );
      }
    }
    this.schedule();
  }

  public close(): void {
    this.closed = true;
    this.queue = [];
    this.resolveIdle();
  }

  // 队列清空（或订阅关闭）后 resolve
  public idle(): Promise<void> {
    if (this.closed || (!this.draining && !this.scheduled && this.queue.length === 0)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.draining || this.scheduled) {
      return;
    }
    this.scheduled = true;
    queueMicrotask(() => {
      this.scheduled = false;
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    this.draining = true;
    while (!this.closed && this.queue.length > 0) {
      const event = this.queue.shift();
      if (!event) {
        break;
      }
      try {
        await this.consumer(event);
        this.deliveredCount += 1;
      } catch (error) {
        console.warn(
          `[StreamBus] Subscriber ${this.id} failed on event #${event.sequence} (${event.type})`,
          error
        );
      }
    }
    this.draining = false;
    this.resolveIdle();
  }

  private resolveIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}

/**
 * 单次运行的事件广播通道。
 * 发送方永远不会被慢订阅者阻塞，每个订阅者拥有自己的有界队列。
 */
export class StreamBus {
  // 底层 EventEmitter 负责把事件同步分发到各订阅者的队列
  private emitter = new EventEmitter();

  private readonly subscriptions = new Set<StreamSubscription>();

  private readonly historyBuffer: StreamEvent[] = [];

  private nextSequence = 0;

  private readonly queueLimit: number;

  private readonly historyLimit: number;

  public readonly runId: string | null;

  constructor(options: StreamBusOptions = {}) {
    this.runId = options.runId ?? null;
    this.queueLimit = options.subscriberQueueLimit ?? DEFAULT_QUEUE_LIMIT;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  public subscribe(
    consumer: StreamConsumer,
    options: StreamSubscribeOptions = {}
  ): StreamSubscription {
    const subscription = new StreamSubscription(
      consumer,
      options.queueLimit ?? this.queueLimit
    );
    if (options.replay) {
      this.historyBuffer.forEach((event) => subscription.push(event));
    }
    const handler = (event: StreamEvent) => subscription.push(event);
    this.emitter.on(subscription.id, handler);
    this.subscriptions.add(subscription);
    return subscription;
  }

  public unsubscribe(subscription: StreamSubscription): void {
    if (!this.subscriptions.delete(subscription)) {
      return;
    }
    this.emitter.removeAllListeners(subscription.id);
    subscription.close();
  }

  public get subscriberCount(): number {
    return this.subscriptions.size;
  }

  public emit(type: StreamEventType, data: Record<string, unknown> = {}): StreamEvent {
    const event: StreamEvent = Object.freeze({
      type,
      data: frozenRecord(data),
      sequence: this.nextSequence,
      timestamp: Date.now(),
    });
    this.nextSequence += 1;

    this.historyBuffer.push(event);
    if (this.historyBuffer.length > this.historyLimit) {
      this.historyBuffer.shift();
    }

    this.subscriptions.forEach((subscription) => {
      this.emitter.emit(subscription.id, event);
    });
    return event;
  }

  public emitStart(goal: string, data: Record<string, unknown> = {}): StreamEvent {
    return this.emit('START', { goal, ...this.runFields(), ...data });
  }

  public emitPlanning(message: string, data: Record<string, unknown> = {}): StreamEvent {
    return this.emit('PLANNING', { message, ...data });
  }

  public emitThinking(
    kind: ThoughtKind,
    content: string,
    subtaskId: string | null = null
  ): StreamEvent {
    return this.emit('THINKING', { kind, content, subtaskId });
  }

  public emitExecution(message: string, data: Record<string, unknown> = {}): StreamEvent {
    return this.emit('EXECUTION', { message, ...data });
  }

  public emitToolCall(phase: ToolCallPhase, data: Record<string, unknown>): StreamEvent {
    return this.emit('TOOL_CALL', { phase, ...data });
  }

  public emitProgress(
    completed: number,
    total: number,
    data: Record<string, unknown> = {}
  ): StreamEvent {
    const percent = total > 0 ? Math.round((completed / total) * 100) : 100;
    return this.emit('PROGRESS', { completed, total, percent, ...data });
  }

  public emitEvaluation(kind: 'step' | 'final', evaluation: object): StreamEvent {
    return this.emit('EVALUATION', { kind, evaluation });
  }

  public emitComplete(status: string, data: Record<string, unknown> = {}): StreamEvent {
    return this.emit('COMPLETE', { status, ...this.runFields(), ...data });
  }

  public emitError(error: StructuredError, data: Record<string, unknown> = {}): StreamEvent {
    return this.emit('ERROR', { error, ...data });
  }

  public history(): StreamEvent[] {
    return [...this.historyBuffer];
  }

  /**
   * 等待所有订阅者的队列投递完毕。
   */
  public async flush(): Promise<void> {
    await Promise.all(Array.from(this.subscriptions).map((subscription) => subscription.idle()));
  }

  /**
   * 暴露一个冷 Observable，在订阅时注册一个投递通道，
   * 并在取消订阅时自动注销。
   */
  public events(options: StreamSubscribeOptions = {}): Observable<StreamEvent> {
    return new Observable<StreamEvent>((subscriber) => {
      const subscription = this.subscribe((event) => subscriber.next(event), options);
      return () => {
        this.unsubscribe(subscription);
      };
    });
  }

  public eventsOfType(
    type: StreamEventType,
    options: StreamSubscribeOptions = {}
  ): Observable<StreamEvent> {
    return this.events(options).pipe(filter((evt) => evt.type === type));
  }

  private runFields(): Record<string, unknown> {
    return this.runId ? { runId: this.runId } : {};
  }
}

export function serializeStreamEvent(event: StreamEvent): string {
  return JSON.stringify({
    type: event.type,
    data: event.data,
    timestamp: event.timestamp,
    sequence: event.sequence,
  });
}

export function formatSseFrame(event: StreamEvent): string {
  return `id: ${event.sequence}\nevent: ${event.type}\ndata: ${serializeStreamEvent(event)}\n\n`;
}

// 事件数据逐层复制后冻结，订阅者之间、订阅者与发送方之间互不影响；
// 普通对象与数组之外的值（类实例、函数等）按引用保留
function frozenRecord(data: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  Object.entries(data).forEach(([key, value]) => {
    copy[key] = frozenCopy(value);
  });
  return Object.freeze(copy);
}

function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown) => frozenCopy(item)));
  }
  if (isPlainObject(value)) {
    return frozenRecord(value);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
