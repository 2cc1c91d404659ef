import { describe, expect, it } from "vitest";
import { loadConfig } from "../../config/index.js";
import { FatalProviderError, TransientProviderError } from "../../errors/index.js";
import { StreamBus } from "../../event/StreamBus.js";
import { WorkingMemory } from "../../memory/WorkingMemory.js";
import { InMemoryToolRegistry } from "../../registry/ToolRegistry.js";
import {
  ScriptedCompletionClient,
  textReply,
  toolCallReply,
} from "../../testing/ScriptedCompletionClient.js";
import { MathTool } from "../../tools/MathTool.js";
import type { Tool } from "../../types/index.js";
import { ExecutionEngine } from "../ExecutionEngine.js";

const config = loadConfig(
  { agent: { maxIterations: 3 }, llm: { retry: { initialDelayMs: 0, maxDelayMs: 0 } } },
  {}
);

const diskTool: Tool = {
  name: "write_file",
  description: "Writes a file to disk",
  parameterSchema: {
    type: "object",
    properties: { path: { type: "string" } },
    required: ["path"],
  },
  execute: async () => ({ success: false, error: "disk full" }),
};

const explodingTool: Tool = {
  name: "explode",
  description: "Always throws",
  parameterSchema: { type: "object", properties: {} },
  execute: async () => {
    throw new Error("boom");
  },
};

function setup(completion: ScriptedCompletionClient) {
  const toolRegistry = new InMemoryToolRegistry([diskTool, explodingTool, new MathTool()]).seal();
  const engine = new ExecutionEngine({ completion, toolRegistry, config });
  return { engine, memory: new WorkingMemory(), stream: new StreamBus() };
}

describe("ExecutionEngine", () => {
  it("feeds a failed tool outcome back to the model and keeps going", async () => {
    const completion = new ScriptedCompletionClient({
      execution: [
        toolCallReply({ id: "call_1", name: "write_file", arguments: '{"path":"out.txt"}' }),
        toolCallReply({ id: "call_2", name: "write_file", arguments: { path: "out.txt" } }),
        textReply("Saving failed: disk full"),
      ],
    });
    const { engine, memory, stream } = setup(completion);

    const result = await engine.execute("Save the report", { memory, stream });

    expect(result).toMatchObject({
      success: true,
      output: "Saving failed: disk full",
      error: null,
      iterations: 3,
      toolCalls: 2,
    });
    expect(result.invocations[0].arguments).toEqual({ path: "out.txt" });
    expect(result.invocations[0].outcome).toEqual({ success: false, error: "disk full" });

    const second = completion.requestsFor("execution")[1];
    expect(second.messages.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
      "tool",
    ]);
    expect(second.messages[3]).toMatchObject({
      role: "tool",
      toolCallId: "call_1",
      content:
        '{"tool_name":"write_file","arguments":{"path":"out.txt"},"outcome":{"success":false,"error":"disk full"}}',
    });
    expect(second.tools?.map((tool) => tool.function.name)).toEqual(["write_file", "explode", "math"]);
  });

  it("stops after the configured number of model calls", async () => {
    const call = toolCallReply({ id: "call_x", name: "write_file", arguments: { path: "a" } });
    const completion = new ScriptedCompletionClient({ execution: [call, call, call, call] });
    const { engine, memory } = setup(completion);

    const result = await engine.execute("Keep trying", { memory });

    expect(completion.requestsFor("execution")).toHaveLength(3);
    expect(completion.remaining("execution")).toBe(1);
    expect(result.success).toBe(false);
    expect(result.iterations).toBe(3);
    expect(result.toolCalls).toBe(3);
    expect(result.error).toMatchObject({
      kind: "iteration_budget_exceeded",
      message: "Task execution exceeded maximum iterations (3)",
    });
  });

  it("records lookup misses, bad arguments and thrown tools as failed outcomes", async () => {
    const completion = new ScriptedCompletionClient({
      execution: [
        toolCallReply(
          { name: "teleport", arguments: {} },
          { name: "math", arguments: '{"expression": 5}' },
          { name: "math", arguments: "{not json" },
          { name: "explode", arguments: "" }
        ),
        textReply("done"),
      ],
    });
    const { engine, memory } = setup(completion);

    const result = await engine.execute("Try tools", { memory });

    expect(result.success).toBe(true);
    expect(result.iterations).toBe(2);
    expect(result.toolCalls).toBe(4);
    const [unknown, badType, badJson, thrown] = result.invocations;
    expect(unknown.id).toMatch(/^call_/);
    expect(unknown.outcome).toEqual({ success: false, error: "Tool 'teleport' not found" });
    expect(badType.outcome).toEqual({
      success: false,
      error: "Invalid arguments for tool 'math': Invalid type for expression: expected string",
    });
    expect(badJson.outcome.success).toBe(false);
    if (!badJson.outcome.success) {
      expect(badJson.outcome.error).toMatch(/^Invalid JSON arguments for tool 'math': /);
    }
    expect(thrown.outcome).toEqual({ success: false, error: "Tool 'explode' failed: boom" });
  });

  it("dispatches tool calls in order and streams request/result pairs", async () => {
    const completion = new ScriptedCompletionClient({
      execution: [
        toolCallReply({ id: "c1", name: "math", arguments: { expression: "10 * 5 + 5^3 - 10" } }),
        textReply("165"),
      ],
    });
    const { engine, memory, stream } = setup(completion);

    const result = await engine.execute("Compute", { memory, stream });

    expect(result.output).toBe("165");
    expect(result.invocations[0].outcome).toEqual({
      success: true,
      result: { expression: "10 * 5 + 5^3 - 10", result: 165 },
    });
    const events = stream.history();
    expect(events.map((event) => event.type)).toEqual([
      "EXECUTION",
      "TOOL_CALL",
      "TOOL_CALL",
      "EXECUTION",
    ]);
    expect(events[0].data).toEqual({
      message: "Model call 1/3",
      iteration: 1,
      maxIterations: 3,
      subtaskId: null,
    });
    expect(events[1].data).toMatchObject({ phase: "request", id: "c1", toolName: "math" });
    expect(events[2].data).toMatchObject({ phase: "result", id: "c1", toolName: "math" });
  });

  it("turns a fatal provider error into a failed result", async () => {
    const completion = new ScriptedCompletionClient({
      execution: [new FatalProviderError("invalid key", { status: 401 })],
    });
    const { engine, memory } = setup(completion);

    const result = await engine.execute("Anything", { memory });

    expect(result.success).toBe(false);
    expect(result.iterations).toBe(1);
    expect(result.error).toEqual({
      kind: "fatal_provider",
      name: "FatalProviderError",
      message: "invalid key",
      details: { status: 401 },
    });
  });

  it("escalates exhausted transient failures", async () => {
    const transient = new TransientProviderError("rate limited", { status: 429 });
    const completion = new ScriptedCompletionClient({
      execution: [transient, transient, transient],
    });
    const { engine, memory } = setup(completion);

    const result = await engine.execute("Anything", { memory });

    expect(completion.requestsFor("execution")).toHaveLength(3);
    expect(result.error).toMatchObject({
      kind: "execution_failure",
      message: "Model call failed after retries: rate limited",
      details: { status: 429 },
    });
  });

  it("does not call the model once cancelled", async () => {
    const completion = new ScriptedCompletionClient({ execution: [textReply("never")] });
    const { engine, memory } = setup(completion);
    const controller = new AbortController();
    controller.abort();

    const result = await engine.execute("Anything", { memory, signal: controller.signal });

    expect(completion.requests).toHaveLength(0);
    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe("cancelled");
  });

  it("passes prerequisite outputs to a subtask", async () => {
    const completion = new ScriptedCompletionClient({ execution: [textReply("summary")] });
    const { engine, memory } = setup(completion);

    await engine.executeSubtask(
      {
        id: "2",
        description: "Summarize",
        reasoning: "Needs the rows",
        dependencies: ["1"],
        status: "in_progress",
      },
      { memory },
      [{ id: "1", output: "rows" }]
    );

    expect(completion.requests[0].messages[1].content).toBe(
      "Subtask [2]: Summarize\nWhy: Needs the rows\nResults of prerequisite subtasks:\n- [1] rows"
    );
  });

  it("keeps the task in view after older tool rounds are pruned", async () => {
    const completion = new ScriptedCompletionClient({
      execution: [
        toolCallReply({ id: "call_1", name: "math", arguments: { expression: "2+2" } }),
        toolCallReply({ id: "call_2", name: "math", arguments: { expression: "2*2" } }),
        textReply("4"),
      ],
    });
    const { engine, stream } = setup(completion);
    const memory = new WorkingMemory(4);

    const result = await engine.execute("Compute 2+2", { memory, stream });

    expect(result.success).toBe(true);
    const third = completion.requestsFor("execution")[2];
    expect(third.messages.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
      "tool",
    ]);
    expect(third.messages[1].content).toBe("Compute 2+2");
    expect(third.messages[3]).toMatchObject({ role: "tool", toolCallId: "call_2" });
  });

  it("names the configured agent in the system prompt", async () => {
    const completion = new ScriptedCompletionClient({ execution: [textReply("ok")] });
    const { engine, memory } = setup(completion);

    await engine.execute("Say ok", { memory });

    const [system] = completion.requests[0].messages;
    expect(system.role).toBe("system");
    expect(system.content.startsWith("You are TaskWeave, the execution component")).toBe(true);
  });
});
