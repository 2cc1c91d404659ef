import { lastValueFrom, toArray } from "rxjs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../config/index.js";
import { FatalProviderError } from "../../errors/index.js";
import { StreamBus } from "../../event/StreamBus.js";
import { InMemoryLongTermMemory } from "../../memory/LongTermMemory.js";
import { InMemoryToolRegistry } from "../../registry/ToolRegistry.js";
import {
  ScriptedCompletionClient,
  jsonReply,
  textReply,
  toolCallReply,
} from "../../testing/ScriptedCompletionClient.js";
import { EchoTool } from "../../tools/EchoTool.js";
import { MathTool } from "../../tools/MathTool.js";
import { TaskOrchestrator } from "../TaskOrchestrator.js";

const config = loadConfig({ llm: { retry: { initialDelayMs: 0, maxDelayMs: 0 } } }, {});

const twoStepPlan = jsonReply({
  strategy: "Compute then report",
  subtasks: [
    { id: "1", description: "Compute 6*7" },
    { id: "2", description: "Report the answer", dependencies: ["1"] },
  ],
});

function setup(completion: ScriptedCompletionClient) {
  const longTermMemory = new InMemoryLongTermMemory();
  const orchestrator = new TaskOrchestrator({
    completion,
    toolRegistry: new InMemoryToolRegistry([new EchoTool(), new MathTool()]).seal(),
    config,
    longTermMemory,
  });
  return { orchestrator, longTermMemory };
}

describe("TaskOrchestrator", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("plans, executes in dependency order and scores the run", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [twoStepPlan],
      execution: [
        toolCallReply({ id: "c1", name: "math", arguments: { expression: "6*7" } }),
        textReply("42"),
        textReply("The answer is 42"),
      ],
      evaluation: [
        jsonReply({ success: true, score: 1 }),
        jsonReply({ success: true, score: 0.5 }),
        jsonReply({ summary: "Answered", lessons_learned: ["use the math tool"] }),
      ],
    });
    const { orchestrator, longTermMemory } = setup(completion);

    const outcome = await orchestrator.run("What is 6*7?", { runId: "run-1" });

    expect(outcome.status).toBe("completed");
    expect(outcome.error).toBeNull();
    expect(outcome.output).toBe("The answer is 42");
    expect(outcome.plan?.subtasks.map((subtask) => subtask.status)).toEqual([
      "completed",
      "completed",
    ]);
    expect(outcome.evaluation?.overallScore).toBeCloseTo(0.75);
    expect(outcome.evaluation?.overallSuccess).toBe(true);
    expect(outcome.evaluation?.summary).toBe("Answered");

    const executions = completion.requestsFor("execution");
    const secondStep = executions[2].messages[executions[2].messages.length - 1];
    expect(secondStep.content).toBe(
      "Subtask [2]: Report the answer\nResults of prerequisite subtasks:\n- [1] 42"
    );

    const [record] = await longTermMemory.recent(1);
    expect(record.runId).toBe("run-1");
    expect(record.status).toBe("completed");
    expect(await longTermMemory.getLearning("lessons:run-1")).toEqual(["use the math tool"]);
  });

  it("averages the step scores of independent subtasks", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [
        jsonReply({
          subtasks: [
            { id: "a", description: "Draft the intro" },
            { id: "b", description: "Draft the body" },
            { id: "c", description: "Draft the outro" },
          ],
        }),
      ],
      execution: [textReply("intro"), textReply("body"), textReply("outro")],
      evaluation: [
        jsonReply({ success: true, score: 1 }),
        jsonReply({ success: true, score: 0.5 }),
        jsonReply({ success: false, score: 0 }),
        jsonReply({ summary: "Partly done" }),
      ],
    });
    const { orchestrator } = setup(completion);

    const outcome = await orchestrator.run("Write a short post");

    expect(outcome.status).toBe("completed");
    expect(outcome.stepEvaluations.map((entry) => [entry.stepId, entry.score])).toEqual([
      ["a", 1],
      ["b", 0.5],
      ["c", 0],
    ]);
    expect(outcome.evaluation?.overallScore).toBeCloseTo(0.5);
    expect(outcome.evaluation?.overallSuccess).toBe(false);
    expect(outcome.output).toBe("outro");
  });

  it("reflects on each finished subtask", async () => {
    const completion = new ScriptedCompletionClient({
      thinking: [textReply("Use the math tool"), textReply("The sum is right")],
      planning: [jsonReply({ subtasks: [{ description: "Add 2 and 2" }] })],
      execution: [textReply("4")],
      evaluation: [jsonReply({ success: true, score: 1 }), jsonReply({ summary: "ok" })],
    });
    const { orchestrator } = setup(completion);

    const outcome = await orchestrator.run("What is 2+2?");

    expect(outcome.thoughts.map((thought) => [thought.kind, thought.content, thought.subtaskId])).toEqual([
      ["reasoning", "Use the math tool", null],
      ["reflection", "The sum is right", "1"],
    ]);
    expect(completion.requestsFor("thinking")[1].messages[1].content).toBe(
      "Context: Action taken: Add 2 and 2\nExpected outcome: The step is completed\nActual result: 4\n\nQuestion: Did this action achieve what we wanted? What should we do next?"
    );
  });

  it("skips dependents of a failed subtask and scores them zero", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [twoStepPlan],
      execution: [new FatalProviderError("model rejected the request", { status: 400 })],
    });
    const { orchestrator } = setup(completion);

    const outcome = await orchestrator.run("What is 6*7?");

    expect(outcome.status).toBe("completed");
    expect(outcome.plan?.subtasks.map((subtask) => subtask.status)).toEqual(["failed", "skipped"]);
    expect(outcome.stepEvaluations.map((entry) => [entry.stepId, entry.score, entry.issues])).toEqual([
      ["1", 0, ["model rejected the request"]],
      ["2", 0, ["unmet dependency: 1 failed"]],
    ]);
    expect(outcome.evaluation?.overallScore).toBe(0);
    expect(outcome.evaluation?.overallSuccess).toBe(false);
    expect(outcome.output).toBeNull();
  });

  it("reports a planning failure as one structured error", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [new FatalProviderError("invalid api key", { status: 401 })],
    });
    const { orchestrator } = setup(completion);
    const stream = new StreamBus();

    const outcome = await orchestrator.run("What is 6*7?", { stream });

    expect(outcome.status).toBe("failed");
    expect(outcome.plan).toBeNull();
    expect(outcome.evaluation).toBeNull();
    expect(outcome.error).toEqual({
      kind: "fatal_provider",
      name: "FatalProviderError",
      message: "invalid api key",
      details: { status: 401 },
    });
    expect(stream.history().map((event) => event.type)).toEqual([
      "START",
      "PLANNING",
      "ERROR",
      "COMPLETE",
    ]);
    expect(stream.history()[3].data).toEqual({
      status: "failed",
      overallScore: null,
      overallSuccess: false,
      error: outcome.error,
    });
  });

  it("rejects a blank goal", async () => {
    const completion = new ScriptedCompletionClient();
    const { orchestrator } = setup(completion);

    const outcome = await orchestrator.run("   ");

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.kind).toBe("validation");
    expect(outcome.error?.message).toBe("Goal must not be empty");
    expect(completion.requests).toHaveLength(0);
  });

  it("does nothing for a run cancelled up front", async () => {
    const completion = new ScriptedCompletionClient();
    const { orchestrator } = setup(completion);
    const controller = new AbortController();
    controller.abort();

    const outcome = await orchestrator.run("What is 6*7?", { signal: controller.signal });

    expect(outcome.status).toBe("cancelled");
    expect(outcome.error?.kind).toBe("cancelled");
    expect(completion.requests).toHaveLength(0);
  });

  it("skips the remaining subtasks once cancelled mid-run", async () => {
    const controller = new AbortController();
    const completion = new ScriptedCompletionClient({
      planning: [twoStepPlan],
      execution: [textReply("partial")],
      evaluation: [
        () => {
          controller.abort();
          return jsonReply({ success: true, score: 1 });
        },
      ],
    });
    const { orchestrator } = setup(completion);

    const outcome = await orchestrator.run("What is 6*7?", { signal: controller.signal });

    expect(outcome.status).toBe("cancelled");
    expect(outcome.error?.message).toBe("Run cancelled");
    expect(outcome.plan?.subtasks[1]).toMatchObject({
      status: "skipped",
      skipReason: "run cancelled",
    });
    expect(outcome.output).toBe("partial");
    expect(completion.requestsFor("execution")).toHaveLength(1);
  });

  it("keeps delivering to one subscriber after another leaves", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [twoStepPlan],
      execution: [textReply("42"), textReply("The answer is 42")],
    });
    const { orchestrator } = setup(completion);
    const stream = new StreamBus({ runId: "run-s" });
    const early: number[] = [];
    const steady: number[] = [];
    const leaving = stream.subscribe((event) => {
      early.push(event.sequence);
      if (early.length === 2) {
        stream.unsubscribe(leaving);
      }
    });
    const staying = stream.subscribe((event) => {
      steady.push(event.sequence);
    });

    await orchestrator.run("What is 6*7?", { stream });
    await staying.idle();

    const history = stream.history();
    expect(early).toEqual([0, 1]);
    expect(steady).toEqual(history.map((_, index) => index));
    expect(history[history.length - 1].type).toBe("COMPLETE");
    expect(stream.subscriberCount).toBe(1);
  });

  it("exposes a run as an observable that completes after COMPLETE", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [jsonReply({ subtasks: [{ description: "Say hi" }] })],
      execution: [textReply("hi")],
    });
    const { orchestrator } = setup(completion);

    const { events$, result } = orchestrator.stream("Greet", { runId: "run-o" });
    const events = await lastValueFrom(events$.pipe(toArray()));
    const outcome = await result;

    expect(outcome.runId).toBe("run-o");
    expect(events[0].type).toBe("START");
    expect(events[events.length - 1].type).toBe("COMPLETE");
    expect(events.map((event) => event.sequence)).toEqual(events.map((_, index) => index));
  });

  it("delivers every event to a streaming consumer before returning", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [jsonReply({ subtasks: [{ description: "Say hi" }] })],
      execution: [textReply("hi")],
    });
    const { orchestrator } = setup(completion);
    const types: string[] = [];

    const outcome = await orchestrator.runStreaming("Greet", (event) => {
      types.push(event.type);
    });

    expect(outcome.status).toBe("completed");
    expect(types[0]).toBe("START");
    expect(types[types.length - 1]).toBe("COMPLETE");
  });
});

describe("TaskOrchestrator.handle", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers greetings without planning", async () => {
    const completion = new ScriptedCompletionClient({
      classification: [jsonReply({ type: "GREETING", use_full_workflow: false })],
    });
    const { orchestrator } = setup(completion);

    await expect(orchestrator.handle("hello")).resolves.toMatchObject({
      kind: "direct",
      response:
        "Hello! I can plan and carry out multi-step tasks for you. What can I help you with today?",
    });
    expect(completion.requestsFor("planning")).toHaveLength(0);
  });

  it("runs simple questions as a single task", async () => {
    const completion = new ScriptedCompletionClient({
      classification: [jsonReply({ type: "SIMPLE_QUESTION", use_full_workflow: false })],
      execution: [textReply("Zod validates data")],
    });
    const { orchestrator } = setup(completion);

    await expect(orchestrator.handle("What is zod?")).resolves.toMatchObject({
      kind: "quick",
      result: { success: true, output: "Zod validates data" },
    });
    expect(completion.requestsFor("planning")).toHaveLength(0);
  });

  it("sends complex tasks through the full workflow", async () => {
    const completion = new ScriptedCompletionClient({
      classification: [jsonReply({ type: "COMPLEX_TASK", use_full_workflow: true })],
      planning: [jsonReply({ subtasks: [{ description: "Do the work" }] })],
      execution: [textReply("done")],
    });
    const { orchestrator } = setup(completion);

    const result = await orchestrator.handle("Plan a release");

    expect(result.kind).toBe("run");
    if (result.kind === "run") {
      expect(result.outcome.status).toBe("completed");
      expect(result.outcome.output).toBe("done");
    }
  });
});
