export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './llm/types.js';
export * from './llm/ChatModelClient.js';
export * from './llm/retry.js';
export { parseModelJson } from './llm/json.js';
export type { JsonPayloadResult } from './llm/json.js';
export * from './registry/ToolRegistry.js';
export { validateToolArguments } from './registry/argumentValidation.js';
export * from './tools/EchoTool.js';
export * from './tools/MathTool.js';
export * from './event/StreamBus.js';
export * from './memory/WorkingMemory.js';
export * from './memory/LongTermMemory.js';
export * from './planner/dependencyGraph.js';
export * from './planner/schedule.js';
export * from './planner/PlanningEngine.js';
export * from './thinking/ThinkingEngine.js';
export * from './evaluation/EvaluationEngine.js';
export * from './classifier/QueryClassifier.js';
export * from './core/ExecutionEngine.js';
export * from './core/RunContext.js';
export * from './core/runOutcome.js';
export * from './core/TaskOrchestrator.js';
export * from './core/AgentOrchestrator.js';
export * from './collaboration/PlannerRole.js';
export * from './collaboration/ExecutorRole.js';
export * from './collaboration/ReviewerRole.js';
export * from './fsm/executionMachine.js';
export * from './fsm/collaborationMachine.js';
export { createCollaborationServices } from './fsm/collaborationServices.js';
export type { CollaborationRoles } from './fsm/collaborationServices.js';
