import type { StructuredError } from '../errors/index.js';
import type { FinalEvaluation, Plan, StepEvaluation, SubTask } from '../types/index.js';

export interface CollaborationMachineContext {
  /** 当前正在执行或评审的子任务 id */
  currentSubtaskId: string | null;
  /** 按评审顺序累积的单步评估 */
  stepEvaluations: StepEvaluation[];
  /** 最近一次失败评审的原因，作为重规划提示 */
  lastFailure: string | null;
  /** 已发生的重规划次数 */
  replans: number;
  maxReplans: number;
  allowReplanning: boolean;
  /** 重规划预算已耗尽 */
  exhausted: boolean;
  evaluation: FinalEvaluation | null;
  error: StructuredError | null;
}

export type CollaborationMachineEvents = { type: 'START' };

export interface CollaborationMachineInput {
  maxReplans: number;
  allowReplanning: boolean;
}

export interface CollaborationMachineOutput {
  succeeded: boolean;
  evaluation: FinalEvaluation | null;
  stepEvaluations: StepEvaluation[];
  replans: number;
  exhausted: boolean;
  error: StructuredError | null;
}

export interface AggregateInput {
  stepEvaluations: StepEvaluation[];
  exhausted: boolean;
}

export interface AggregateResult {
  evaluation: FinalEvaluation;
  stepEvaluations: StepEvaluation[];
}

/**
 * 状态机调用的异步服务；计划本身由 RunContext 持有，状态机只保存控制数据。
 */
export interface CollaborationServices {
  plan(): Promise<Plan>;
  /** 选出下一个可执行子任务；没有或已取消时返回 null */
  scheduleNext(): Promise<SubTask | null>;
  execute(subtaskId: string): Promise<void>;
  review(subtaskId: string): Promise<StepEvaluation>;
  replan(failureReason: string): Promise<Plan>;
  aggregate(input: AggregateInput): Promise<AggregateResult>;
  isCancelled(): boolean;
}
