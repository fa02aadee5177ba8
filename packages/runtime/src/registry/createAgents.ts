import { CalendarAgent } from "../agents/CalendarAgent.js";
import { CommunicationAgent } from "../agents/CommunicationAgent.js";
import { KnowledgeAgent } from "../agents/KnowledgeAgent.js";
import { MessagingAgent } from "../agents/MessagingAgent.js";
import { SearchAgent } from "../agents/SearchAgent.js";
import type { OrchestratorConfig } from "../config/index.js";
import { ChatModelClient } from "../llm/ChatModelClient.js";
import { OracleGateway } from "../llm/OracleGateway.js";
import type { AgentAdapterMap, Oracle } from "../types/index.js";

export function createOracle(config: OrchestratorConfig): OracleGateway {
  const { llm } = config;
  const client = new ChatModelClient({
    provider: llm.provider,
    apiKey: llm.apiKey,
    requestTimeoutMs: llm.requestTimeoutMs,
    ...(llm.baseURL ? { baseURL: llm.baseURL } : {}),
    ...(llm.model ? { model: llm.model } : {}),
  });
  if (!client.isConfigured()) {
    console.warn(`[createOracle] No API key for provider ${llm.provider}, LLM calls will fail.`);
  }
  return new OracleGateway({ client });
}

/**
 * 按配置创建一整套真实代理。每个任务调用一次，任务之间不共享代理实例。
 */
export function createAgents(config: OrchestratorConfig, oracle: Oracle): AgentAdapterMap {
  return {
    Messaging: new MessagingAgent({ botToken: config.slack.botToken }),
    Knowledge: new KnowledgeAgent({ directory: config.knowledge.directory, oracle }),
    Search: new SearchAgent({ maxResults: config.search.maxResults }),
    Calendar: new CalendarAgent({
      credentialsPath: config.google.credentialsPath,
      tokenPath: config.google.tokenPath,
      timeZone: config.google.timeZone,
    }),
    Communication: new CommunicationAgent({
      accountSid: config.twilio.accountSid,
      authToken: config.twilio.authToken,
      fromNumber: config.twilio.phoneNumber,
    }),
  };
}
