import { loadConfig } from "../config/index.js";
import { AgentOrchestrator } from "../core/AgentOrchestrator.js";
import { TaskOrchestrator } from "../core/TaskOrchestrator.js";
import { formatSseFrame } from "../event/StreamBus.js";
import { ChatModelClient } from "../llm/ChatModelClient.js";
import { JsonlLongTermMemory } from "../memory/LongTermMemory.js";
import { InMemoryToolRegistry } from "../registry/ToolRegistry.js";
import { EchoTool } from "../tools/EchoTool.js";
import { MathTool } from "../tools/MathTool.js";

async function main() {
  const config = loadConfig();
  const toolRegistry = new InMemoryToolRegistry([new EchoTool(), new MathTool()]).seal();
  const completion = new ChatModelClient({ provider: "deepseek" });
  const longTermMemory = new JsonlLongTermMemory(".taskweave/runs.jsonl");

  const orchestrator = new TaskOrchestrator({ completion, toolRegistry, config, longTermMemory });

  const outcome = await orchestrator.runStreaming(
    "帮我计算一下 10 * 5 + (5^3) - 10 的结果",
    (event) => {
      process.stdout.write(formatSseFrame(event));
    }
  );

  // eslint-disable-next-line no-console
  console.log("Run outcome:", JSON.stringify(outcome.evaluation, null, 2));

  if (process.argv.includes("--collaborative")) {
    const collaborative = new AgentOrchestrator({ completion, toolRegistry, config, longTermMemory });
    const result = await collaborative.run("Compute 2^10 and echo the answer back");
    // eslint-disable-next-line no-console
    console.log("Collaborative transcript:", JSON.stringify(result.transcript, null, 2));
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
