import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../config/index.js";
import type { OrchestratorConfigInput } from "../../config/index.js";
import { FatalProviderError } from "../../errors/index.js";
import { StreamBus } from "../../event/StreamBus.js";
import { InMemoryToolRegistry } from "../../registry/ToolRegistry.js";
import {
  ScriptedCompletionClient,
  jsonReply,
  textReply,
} from "../../testing/ScriptedCompletionClient.js";
import { MathTool } from "../../tools/MathTool.js";
import { AgentOrchestrator } from "../AgentOrchestrator.js";

function orchestratorFor(
  completion: ScriptedCompletionClient,
  planning: OrchestratorConfigInput["planning"] = {}
) {
  return new AgentOrchestrator({
    completion,
    toolRegistry: new InMemoryToolRegistry([new MathTool()]).seal(),
    config: loadConfig(
      { llm: { retry: { initialDelayMs: 0, maxDelayMs: 0 } }, planning },
      {}
    ),
  });
}

const fetchThenConvert = jsonReply({
  subtasks: [
    { id: "1", description: "Fetch the rate" },
    { id: "2", description: "Convert", dependencies: ["1"] },
  ],
});

describe("AgentOrchestrator", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("records a reflection after each executed subtask", async () => {
    const completion = new ScriptedCompletionClient({
      thinking: [textReply("Rate looks current")],
      planning: [jsonReply({ subtasks: [{ description: "Fetch the rate" }] })],
      execution: [textReply("0.92")],
    });

    const outcome = await orchestratorFor(completion).run("Fetch the USD to EUR rate");

    expect(outcome.status).toBe("completed");
    expect(outcome.thoughts.map((thought) => [thought.kind, thought.content, thought.subtaskId])).toEqual([
      ["reflection", "Rate looks current", "1"],
    ]);
  });

  it("replans after a failed review and finishes the revised plan", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [
        fetchThenConvert,
        jsonReply({
          strategy: "Use the cache",
          subtasks: [
            { id: "3", description: "Use the cached rate" },
            { id: "4", description: "Convert", dependencies: ["3"] },
          ],
        }),
      ],
      execution: [
        new FatalProviderError("rate service down"),
        textReply("0.92"),
        textReply("92 EUR"),
      ],
    });
    const stream = new StreamBus();

    const outcome = await orchestratorFor(completion).run("Convert 100 USD", { stream });

    expect(outcome.status).toBe("completed");
    expect(outcome.replans).toBe(1);
    expect(outcome.error).toBeNull();
    expect(outcome.output).toBe("92 EUR");
    expect(outcome.plan?.strategy).toBe("Use the cache");
    expect(outcome.plan?.subtasks.map((subtask) => subtask.id)).toEqual(["3", "4"]);
    expect(outcome.stepEvaluations.map((entry) => entry.stepId)).toEqual(["3", "4"]);
    expect(outcome.evaluation?.overallScore).toBe(1);

    expect(outcome.transcript.map((message) => [message.sender, message.recipient, message.content])).toEqual([
      ["system", "all", "Collaborative run started: Convert 100 USD"],
      ["planner", "all", "Created plan with 2 subtask(s)"],
      ["planner", "executor", "Execute subtask 1: Fetch the rate"],
      ["executor", "reviewer", "Subtask 1 failed: rate service down"],
      ["reviewer", "planner", "Subtask 1 scored 0.00: rate service down"],
      ["planner", "all", "Revised plan with 2 subtask(s)"],
      ["planner", "executor", "Execute subtask 3: Use the cached rate"],
      ["executor", "reviewer", "Subtask 3 finished"],
      ["reviewer", "all", "Subtask 3 scored 1.00"],
      ["planner", "executor", "Execute subtask 4: Convert"],
      ["executor", "reviewer", "Subtask 4 finished"],
      ["reviewer", "all", "Subtask 4 scored 1.00"],
      ["reviewer", "all", "Task completed successfully with an overall score of 1.00"],
      ["system", "all", "Collaborative run completed"],
    ]);

    const replanPrompt = completion.requestsFor("planning")[1].messages[1].content;
    expect(replanPrompt).toContain(
      "Failure reason: Subtask 1 failed review (score 0.00): rate service down"
    );
    expect(stream.history().filter((event) => event.type === "COMPLETE")).toHaveLength(1);
  });

  it("fails with an evaluation once the replan budget is spent", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [
        jsonReply({ subtasks: [{ id: "1", description: "Fetch the rate" }] }),
        jsonReply({
          subtasks: [
            { id: "2", description: "Fetch the rate again" },
            { id: "3", description: "Report" },
          ],
        }),
      ],
      execution: [
        new FatalProviderError("rate service down"),
        new FatalProviderError("still down"),
      ],
    });

    const outcome = await orchestratorFor(completion, { maxReplans: 1 }).run("Convert 100 USD");

    expect(outcome.status).toBe("failed");
    expect(outcome.replans).toBe(1);
    expect(outcome.error).toEqual({
      kind: "execution_failure",
      name: "ExecutionFailure",
      message: "Replan budget exhausted after 1 replan(s)",
      details: { replans: 1, maxReplans: 1 },
    });
    expect(outcome.plan?.subtasks.map((subtask) => [subtask.id, subtask.status])).toEqual([
      ["2", "failed"],
      ["3", "skipped"],
    ]);
    expect(outcome.plan?.subtasks[1].skipReason).toBe("replan budget exhausted");
    expect(outcome.evaluation?.overallScore).toBe(0);
    expect(outcome.evaluation?.overallSuccess).toBe(false);
    expect(outcome.transcript[outcome.transcript.length - 1].content).toBe(
      "Collaborative run failed"
    );
  });

  it("carries on past a failure when replanning is disabled", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [fetchThenConvert],
      execution: [new FatalProviderError("rate service down")],
    });

    const outcome = await orchestratorFor(completion, { allowReplanning: false }).run(
      "Convert 100 USD"
    );

    expect(outcome.status).toBe("completed");
    expect(outcome.replans).toBe(0);
    expect(outcome.plan?.subtasks.map((subtask) => subtask.status)).toEqual(["failed", "skipped"]);
    expect(outcome.stepEvaluations.map((entry) => entry.issues)).toEqual([
      ["rate service down"],
      ["unmet dependency: 1 failed"],
    ]);
    expect(completion.requestsFor("planning")).toHaveLength(1);
  });

  it("fails when the planner cannot produce a plan", async () => {
    const completion = new ScriptedCompletionClient({
      planning: [new FatalProviderError("invalid api key", { status: 401 })],
    });

    const outcome = await orchestratorFor(completion).run("Convert 100 USD");

    expect(outcome.status).toBe("failed");
    expect(outcome.plan).toBeNull();
    expect(outcome.evaluation).toBeNull();
    expect(outcome.error).toMatchObject({ kind: "fatal_provider", message: "invalid api key" });
    expect(outcome.transcript.map((message) => message.content)).toEqual([
      "Collaborative run started: Convert 100 USD",
      "Collaborative run failed",
    ]);
  });

  it("reports a cancelled run", async () => {
    const completion = new ScriptedCompletionClient();
    const controller = new AbortController();
    controller.abort();

    const outcome = await orchestratorFor(completion).run("Convert 100 USD", {
      signal: controller.signal,
    });

    expect(outcome.status).toBe("cancelled");
    expect(outcome.error?.kind).toBe("cancelled");
    expect(completion.requests).toHaveLength(0);
  });
});
