import { createActor } from "xstate";
import { ExecutorRole } from "../collaboration/ExecutorRole.js";
import { PlannerRole } from "../collaboration/PlannerRole.js";
import { ReviewerRole } from "../collaboration/ReviewerRole.js";
import { defaultConfig } from "../config/index.js";
import type { OrchestratorConfig } from "../config/index.js";
import {
  CancelledError,
  ExecutionFailure,
  ValidationError,
  toStructuredError,
} from "../errors/index.js";
import type { StructuredError } from "../errors/index.js";
import { EvaluationEngine } from "../evaluation/EvaluationEngine.js";
import type { StreamBus } from "../event/StreamBus.js";
import { createCollaborationMachine } from "../fsm/collaborationMachine.js";
import type { CollaborationMachineOutput } from "../fsm/collaborationMachine.js";
import { createCollaborationServices } from "../fsm/collaborationServices.js";
import type { CompletionClient } from "../llm/types.js";
import { InMemoryLongTermMemory } from "../memory/LongTermMemory.js";
import type { LongTermMemory } from "../memory/LongTermMemory.js";
import { PlanningEngine } from "../planner/PlanningEngine.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import type { RunStatus } from "../types/index.js";
import { ExecutionEngine } from "./ExecutionEngine.js";
import { RunContext } from "./RunContext.js";
import { finalizeRun } from "./runOutcome.js";
import type { RunOutcome } from "./runOutcome.js";

export interface AgentOrchestratorOptions {
  completion: CompletionClient;
  toolRegistry: ToolRegistry;
  config?: OrchestratorConfig;
  longTermMemory?: LongTermMemory;
}

export interface CollaborativeRunOptions {
  runId?: string;
  stream?: StreamBus;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

export interface CollaborativeRunOutcome extends RunOutcome {
  replans: number;
}

/**
 * 多角色协作编排：planner / executor / reviewer 三个角色由协作状态机驱动，
 * 角色间的每次交流都会记录在运行的消息记录中。
 */
export class AgentOrchestrator {
  private readonly completion: CompletionClient;

  private readonly config: OrchestratorConfig;

  private readonly longTermMemory: LongTermMemory;

  private readonly planner: PlannerRole;

  private readonly executor: ExecutorRole;

  private readonly reviewer: ReviewerRole;

  constructor(options: AgentOrchestratorOptions) {
    this.completion = options.completion;
    this.config = options.config ?? defaultConfig();
    this.longTermMemory = options.longTermMemory ?? new InMemoryLongTermMemory();
    this.planner = new PlannerRole(
      new PlanningEngine({
        completion: options.completion,
        config: this.config,
        toolRegistry: options.toolRegistry,
        longTermMemory: this.longTermMemory,
      })
    );
    this.executor = new ExecutorRole(
      new ExecutionEngine({
        completion: options.completion,
        toolRegistry: options.toolRegistry,
        config: this.config,
      })
    );
    this.reviewer = new ReviewerRole(
      new EvaluationEngine({ completion: options.completion, config: this.config })
    );
  }

  public async run(
    goal: string,
    options: CollaborativeRunOptions = {}
  ): Promise<CollaborativeRunOutcome> {
    const run = new RunContext({
      goal,
      config: this.config,
      completion: this.completion,
      runId: options.runId,
      stream: options.stream,
      signal: options.signal,
    });
    run.stream.emitStart(goal, { mode: "collaborative" });
    run.addMessage("system", "all", `Collaborative run started: ${goal}`);

    let output: CollaborationMachineOutput | null = null;
    let error: StructuredError | null = null;

    try {
      if (!goal.trim()) {
        throw new ValidationError("Goal must not be empty");
      }
      if (run.isCancelled()) {
        throw new CancelledError();
      }
      output = await this.runMachine(run, options.context);
      error = output.error;
      if (output.exhausted && error === null) {
        error = new ExecutionFailure(
          `Replan budget exhausted after ${output.replans} replan(s)`,
          { details: { replans: output.replans, maxReplans: this.config.planning.maxReplans } }
        ).toJSON();
      }
    } catch (caught) {
      error = toStructuredError(caught);
    }

    let status: RunStatus;
    if (run.isCancelled() || error?.kind === "cancelled") {
      status = "cancelled";
      error = error ?? new CancelledError().toJSON();
    } else {
      status = output?.succeeded ? "completed" : "failed";
    }

    if (error) {
      console.error(`[AgentOrchestrator] Run ${run.runId} ${status}: ${error.message}`);
      run.stream.emitError(error);
    }
    run.addMessage("system", "all", `Collaborative run ${status}`, {
      replans: output?.replans ?? 0,
    });

    const outcome = await finalizeRun(
      run,
      this.longTermMemory,
      {
        status,
        evaluation: output?.evaluation ?? null,
        stepEvaluations: output?.stepEvaluations ?? [],
        error,
      },
      "[AgentOrchestrator]"
    );
    return { ...outcome, replans: output?.replans ?? 0 };
  }

  private runMachine(
    run: RunContext,
    planningContext?: Record<string, unknown>
  ): Promise<CollaborationMachineOutput> {
    const machine = createCollaborationMachine(
      createCollaborationServices(
        { planner: this.planner, executor: this.executor, reviewer: this.reviewer },
        run,
        planningContext
      )
    );
    const actor = createActor(machine, {
      input: {
        maxReplans: this.config.planning.maxReplans,
        allowReplanning: this.config.planning.allowReplanning,
      },
    });

    return new Promise<CollaborationMachineOutput>((resolve, reject) => {
      const subscription = actor.subscribe({
        next: (snapshot) => {
          if (snapshot.status === "done") {
            subscription.unsubscribe();
            resolve(snapshot.output);
          }
        },
        error: (error) => {
          subscription.unsubscribe();
          reject(error);
        },
      });

      try {
        actor.start();
        actor.send({ type: "START" });
      } catch (error) {
        subscription.unsubscribe();
        reject(error);
      }
    });
  }
}
