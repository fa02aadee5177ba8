import type {
  AgentAdapter,
  AgentAdapterMap,
  KnownAgentKind,
} from "../types/index.js";
import { KNOWN_AGENT_KINDS } from "../types/index.js";

export interface AgentSummary {
  kind: KnownAgentKind;
  description: string;
  available: boolean;
}

export class AgentRegistry {
  private readonly agents: AgentAdapterMap;

  constructor(agents: AgentAdapterMap) {
    this.agents = agents;
  }

  public get<K extends KnownAgentKind>(kind: K): AgentAdapterMap[K] {
    return this.agents[kind];
  }

  public list(): AgentAdapter[] {
    return KNOWN_AGENT_KINDS.map((kind) => this.agents[kind]);
  }

  public describe(): AgentSummary[] {
    return this.list().map((agent) => ({
      kind: agent.kind,
      description: agent.description,
      available: agent.isAvailable(),
    }));
  }
}

const AGENT_ALIASES: Record<string, KnownAgentKind> = {
  messaging: "Messaging",
  slack: "Messaging",
  knowledge: "Knowledge",
  knowledgebase: "Knowledge",
  search: "Search",
  web: "Search",
  websearch: "Search",
  calendar: "Calendar",
  communication: "Communication",
  twilio: "Communication",
  phone: "Communication",
  sms: "Communication",
};

/**
 * 把 planner 给出的代理名映射到已知类型，忽略大小写、空白与 Agent 后缀；
 * 无法识别时返回 Other，由模拟处理器兜底。
 */
export function resolveAgentKind(agent: string): KnownAgentKind | "Other" {
  const key = agent
    .trim()
    .toLowerCase()
    .replace(/[\s_-]+/g, "")
    .replace(/agent$/, "");
  return AGENT_ALIASES[key] ?? "Other";
}
