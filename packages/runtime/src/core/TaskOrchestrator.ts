import { nanoid } from "nanoid";
import { Observable, takeWhile } from "rxjs";
import { QueryClassifier } from "../classifier/QueryClassifier.js";
import type { QueryClassification } from "../classifier/QueryClassifier.js";
import { defaultConfig } from "../config/index.js";
import type { OrchestratorConfig } from "../config/index.js";
import { CancelledError, ValidationError, toStructuredError } from "../errors/index.js";
import type { StructuredError } from "../errors/index.js";
import { EvaluationEngine } from "../evaluation/EvaluationEngine.js";
import { StreamBus } from "../event/StreamBus.js";
import type { StreamConsumer } from "../event/StreamBus.js";
import type { CompletionClient } from "../llm/types.js";
import { InMemoryLongTermMemory } from "../memory/LongTermMemory.js";
import type { LongTermMemory } from "../memory/LongTermMemory.js";
import { PlanningEngine } from "../planner/PlanningEngine.js";
import {
  clonePlan,
  findNextRunnable,
  markFinished,
  markInProgress,
  planProgress,
  skipRemaining,
} from "../planner/schedule.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type {
  FinalEvaluation,
  Plan,
  RunStatus,
  StepEvaluation,
  StreamEvent,
} from "../types/index.js";
import { ExecutionEngine } from "./ExecutionEngine.js";
import type { ExecutionResult } from "./ExecutionEngine.js";
import { RunContext } from "./RunContext.js";
import { dependencyOutputs, finalizeRun, lastOutput } from "./runOutcome.js";
import type { RunOutcome } from "./runOutcome.js";

export interface TaskOrchestratorOptions {
  completion: CompletionClient;
  toolRegistry: ToolRegistry;
  config?: OrchestratorConfig;
  longTermMemory?: LongTermMemory;
  classifier?: QueryClassifier;
  planner?: PlanningEngine;
  executor?: ExecutionEngine;
  evaluator?: EvaluationEngine;
}

export interface RunOptions {
  runId?: string;
  /** 外部提供的事件流；不提供时每次运行新建一个 */
  stream?: StreamBus;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

export interface StreamingRun {
  events$: Observable<StreamEvent>;
  result: Promise<RunOutcome>;
}

export type HandleResult =
  | { kind: "direct"; classification: QueryClassification; response: string }
  | { kind: "quick"; classification: QueryClassification; result: ExecutionResult }
  | { kind: "run"; classification: QueryClassification; outcome: RunOutcome };

/**
 * 单代理编排：规划 → 按拓扑顺序逐个执行子任务 → 评估 → 持久化。
 * run 永远不会抛出，所有失败都以结构化结果返回。
 */
export class TaskOrchestrator {
  private readonly completion: CompletionClient;

  private readonly config: OrchestratorConfig;

  private readonly longTermMemory: LongTermMemory;

  private readonly classifier: QueryClassifier;

  private readonly planner: PlanningEngine;

  private readonly executor: ExecutionEngine;

  private readonly evaluator: EvaluationEngine;

  constructor(options: TaskOrchestratorOptions) {
    this.completion = options.completion;
    this.config = options.config ?? defaultConfig();
    this.longTermMemory = options.longTermMemory ?? new InMemoryLongTermMemory();
    this.classifier =
      options.classifier ?? new QueryClassifier({ completion: options.completion });
    this.planner =
      options.planner ??
      new PlanningEngine({
        completion: options.completion,
        config: this.config,
        toolRegistry: options.toolRegistry,
        longTermMemory: this.longTermMemory,
      });
    this.executor =
      options.executor ??
      new ExecutionEngine({
        completion: options.completion,
        toolRegistry: options.toolRegistry,
        config: this.config,
      });
    this.evaluator =
      options.evaluator ?? new EvaluationEngine({ completion: options.completion, config: this.config });
  }

  public async run(goal: string, options: RunOptions = {}): Promise<RunOutcome> {
    const run = new RunContext({
      goal,
      config: this.config,
      completion: this.completion,
      runId: options.runId,
      stream: options.stream,
      signal: options.signal,
    });
    const { stream } = run;
    stream.emitStart(goal);

    const stepEvaluations: StepEvaluation[] = [];
    let evaluation: FinalEvaluation | null = null;
    let status: RunStatus = "completed";
    let error: StructuredError | null = null;

    try {
      if (!goal.trim()) {
        throw new ValidationError("Goal must not be empty");
      }
      if (run.isCancelled()) {
        throw new CancelledError();
      }

      await run.thinking.think(
        options.context ? JSON.stringify(options.context) : "Starting new task",
        `What is the best approach to achieve this goal: ${goal}?`,
        "reasoning"
      );

      stream.emitPlanning("Creating plan", { goal });
      const plan = await this.planner.planWithRepair(goal, {
        context: options.context,
        signal: options.signal,
      });
      run.setPlan(plan);
      stream.emitPlanning("Plan ready", { plan: clonePlan(plan) });

      await this.executePlan(run, plan, stepEvaluations);

      // 未被评估的子任务（跳过、取消）计 0 分
      for (const subtask of plan.subtasks) {
        if (!stepEvaluations.some((entry) => entry.stepId === subtask.id)) {
          stepEvaluations.push(await this.evaluator.evaluateStep(subtask));
        }
      }

      evaluation = await this.evaluator.evaluateFinal(goal, plan, stepEvaluations, {
        finalOutput: lastOutput(plan),
        thoughts: run.thinking.thoughts(),
        signal: options.signal,
      });
      stream.emitEvaluation("final", evaluation);

      if (run.isCancelled()) {
        status = "cancelled";
        error = new CancelledError().toJSON();
      }
    } catch (caught) {
      error = toStructuredError(caught);
      status = error.kind === "cancelled" || run.isCancelled() ? "cancelled" : "failed";
      console.error(`[TaskOrchestrator] Run ${run.runId} ${status}: ${error.message}`);
      stream.emitError(error);
    }

    return finalizeRun(
      run,
      this.longTermMemory,
      { status, evaluation, stepEvaluations, error },
      "[TaskOrchestrator]"
    );
  }

  /**
   * 运行并把事件投递给 consumer，返回前等待该订阅者的队列清空。
   */
  public async runStreaming(
    goal: string,
    consumer: StreamConsumer,
    options: Omit<RunOptions, "stream"> = {}
  ): Promise<RunOutcome> {
    const runId = options.runId ?? nanoid();
    const stream = this.createStream(runId);
    const subscription = stream.subscribe(consumer);
    try {
      const outcome = await this.run(goal, { ...options, runId, stream });
      await subscription.idle();
      return outcome;
    } finally {
      stream.unsubscribe(subscription);
    }
  }

  /**
   * 以 Observable 形式暴露一次运行的事件，COMPLETE 之后自动结束。
   */
  public stream(goal: string, options: Omit<RunOptions, "stream"> = {}): StreamingRun {
    const runId = options.runId ?? nanoid();
    const stream = this.createStream(runId);
    const events$ = stream
      .events({ replay: true })
      .pipe(takeWhile((event) => event.type !== "COMPLETE", true));
    const result = this.run(goal, { ...options, runId, stream });
    return { events$, result };
  }

  /**
   * 不经规划与评估直接执行一个简单任务。
   */
  public async quickTask(
    task: string,
    options: Omit<RunOptions, "context"> = {}
  ): Promise<ExecutionResult> {
    const run = new RunContext({
      goal: task,
      config: this.config,
      completion: this.completion,
      runId: options.runId,
      stream: options.stream,
      signal: options.signal,
    });
    try {
      return await this.executor.execute(task, run);
    } finally {
      run.memory.clear();
    }
  }

  /**
   * 先分类再路由：问候直接回复，简单问题走 quickTask，其余走完整流程。
   */
  public async handle(query: string, options: RunOptions = {}): Promise<HandleResult> {
    const classification = await this.classifier.classify(query, options.signal);
    const direct = this.classifier.quickResponse(query, classification);
    if (direct !== null) {
      return { kind: "direct", classification, response: direct };
    }
    if (!classification.useFullWorkflow && classification.type !== "complex_task") {
      const result = await this.quickTask(query, options);
      return { kind: "quick", classification, result };
    }
    const outcome = await this.run(query, options);
    return { kind: "run", classification, outcome };
  }

  private async executePlan(
    run: RunContext,
    plan: Plan,
    stepEvaluations: StepEvaluation[]
  ): Promise<void> {
    const { stream } = run;
    for (;;) {
      if (run.isCancelled()) {
        skipRemaining(plan, "run cancelled");
        return;
      }
      const subtask = findNextRunnable(plan);
      if (!subtask) {
        break;
      }

      markInProgress(plan, subtask);
      const progress = planProgress(plan);
      stream.emitProgress(progress.completed + progress.failed + progress.skipped, progress.total, {
        currentStep: subtask.id,
        description: subtask.description,
      });

      const result = await this.executor.executeSubtask(
        subtask,
        run,
        dependencyOutputs(plan, subtask)
      );

      if (result.error?.kind === "cancelled") {
        subtask.status = "skipped";
        subtask.skipReason = "run cancelled";
        continue;
      }

      markFinished(subtask, {
        success: result.success,
        output: result.output,
        error: result.error?.message ?? null,
        toolCalls: result.toolCalls,
        iterations: result.iterations,
      });

      if (result.success) {
        await run.thinking.reflectOnAction(
          subtask.description,
          result.output,
          subtask.reasoning || "The step is completed",
          subtask.id
        );
      } else {
        await run.thinking.analyzeFailure(
          subtask.description,
          result.error?.message ?? "Unknown error",
          result.iterations,
          subtask.id
        );
      }

      const stepEvaluation = await this.evaluator.evaluateStep(subtask, {
        signal: run.signal,
      });
      stepEvaluations.push(stepEvaluation);
      stream.emitEvaluation("step", stepEvaluation);
    }

    const progress = planProgress(plan);
    stream.emitProgress(progress.completed + progress.failed + progress.skipped, progress.total, {
      completedSteps: progress.completed,
      failedSteps: progress.failed,
      skippedSteps: progress.skipped,
    });
  }

  private createStream(runId: string): StreamBus {
    return new StreamBus({
      runId,
      subscriberQueueLimit: this.config.stream.subscriberQueueLimit,
      historyLimit: this.config.stream.historyLimit,
    });
  }
}
