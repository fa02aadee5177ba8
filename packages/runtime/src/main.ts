import "dotenv/config";
import { KnowledgeAgent } from "./agents/KnowledgeAgent.js";
import { loadConfig } from "./config/index.js";
import { TaskService } from "./core/TaskService.js";
import { EventBus } from "./event/EventBus.js";
import { createAgents, createOracle } from "./registry/createAgents.js";
import { createTaskBridge } from "./server/taskBridge.js";

function main() {
  const config = loadConfig(process.env);
  const eventBus = new EventBus();
  const oracle = createOracle(config);

  const service = new TaskService({
    oracle,
    publisher: eventBus,
    createAgents: () => createAgents(config, oracle),
    stepDelayMs: config.runtime.stepDelayMs,
    simulatedDelayMs: config.runtime.simulatedDelayMs,
  });

  const server = createTaskBridge({
    service,
    eventBus,
    knowledge: new KnowledgeAgent({ directory: config.knowledge.directory, oracle }),
    allowOrigin: config.server.allowOrigin,
  });

  server.listen(config.server.port, () => {
    console.log(`[task-bridge] listening on http://localhost:${config.server.port}`);
  });
}

main();
