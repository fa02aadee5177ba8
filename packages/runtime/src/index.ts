export * from "./types/index.js";
export * from "./errors/OrchestratorError.js";
export * from "./config/index.js";
export * from "./llm/ChatModelClient.js";
export * from "./llm/OracleGateway.js";
export * from "./llm/prompts.js";
export * from "./agents/MessagingAgent.js";
export * from "./agents/KnowledgeAgent.js";
export * from "./agents/SearchAgent.js";
export * from "./agents/CalendarAgent.js";
export * from "./agents/CommunicationAgent.js";
export * from "./registry/AgentRegistry.js";
export * from "./registry/createAgents.js";
export * from "./planner/PlanBuilder.js";
export * from "./core/TaskContext.js";
export * from "./core/Executor.js";
export * from "./core/TaskRuntime.js";
export * from "./core/TaskService.js";
export * from "./event/EventBus.js";
export * from "./fsm/taskMachine.js";
export * from "./server/taskBridge.js";
