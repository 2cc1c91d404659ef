import { toErrorMessage } from "../errors/index.js";
import type { StructuredError } from "../errors/index.js";
import type { LongTermMemory } from "../memory/LongTermMemory.js";
import { clonePlan } from "../planner/schedule.js";
import type {
  AgentMessage,
  FinalEvaluation,
  Plan,
  RunRecord,
  RunStatus,
  StepEvaluation,
  SubTask,
  ThoughtRecord,
} from "../types/index.js";
import type { DependencyOutput } from "./ExecutionEngine.js";
import type { RunContext } from "./RunContext.js";

export interface RunOutcome {
  runId: string;
  goal: string;
  status: RunStatus;
  plan: Plan | null;
  evaluation: FinalEvaluation | null;
  stepEvaluations: StepEvaluation[];
  /** 最后一个完成的子任务输出 */
  output: string | null;
  error: StructuredError | null;
  thoughts: ThoughtRecord[];
  transcript: AgentMessage[];
}

export interface RunResult {
  status: RunStatus;
  evaluation: FinalEvaluation | null;
  stepEvaluations: StepEvaluation[];
  error: StructuredError | null;
}

/**
 * 运行收尾：写入长期记忆、清空工作记忆，最后发出唯一的 COMPLETE 事件。
 * 持久化失败只记录警告，不改变运行结果。
 */
export async function finalizeRun(
  run: RunContext,
  longTermMemory: LongTermMemory,
  result: RunResult,
  label: string
): Promise<RunOutcome> {
  const plan = run.getPlan();
  const thoughts = run.thinking.thoughts();
  const transcript = run.getTranscript();

  const record: RunRecord = {
    runId: run.runId,
    goal: run.goal,
    status: result.status,
    plan: plan ? clonePlan(plan) : null,
    evaluation: result.evaluation,
    transcript,
    thoughts,
    error: result.error,
    completedAt: Date.now(),
  };

  try {
    await longTermMemory.append(record);
    const lessons = result.evaluation?.lessonsLearned ?? [];
    if (lessons.length > 0) {
      await longTermMemory.addLearning(`lessons:${run.runId}`, lessons);
    }
  } catch (persistError) {
    console.warn(`${label} Failed to persist run ${run.runId} (${toErrorMessage(persistError)})`);
  }

  run.memory.clear();
  run.thinking.clear();

  run.stream.emitComplete(result.status, {
    overallScore: result.evaluation?.overallScore ?? null,
    overallSuccess: result.evaluation?.overallSuccess ?? false,
    error: result.error,
  });

  return {
    runId: run.runId,
    goal: run.goal,
    status: result.status,
    plan,
    evaluation: result.evaluation,
    stepEvaluations: result.stepEvaluations,
    output: plan ? lastOutput(plan) : null,
    error: result.error,
    thoughts,
    transcript,
  };
}

export function dependencyOutputs(plan: Plan, subtask: SubTask): DependencyOutput[] {
  return subtask.dependencies.map((id) => {
    const dependency = plan.subtasks.find((entry) => entry.id === id);
    return { id, output: dependency?.result?.output ?? null };
  });
}

export function lastOutput(plan: Plan): string | null {
  for (let i = plan.subtasks.length - 1; i >= 0; i -= 1) {
    const subtask = plan.subtasks[i];
    if (subtask.status === "completed" && subtask.result?.output) {
      return subtask.result.output;
    }
  }
  return null;
}
