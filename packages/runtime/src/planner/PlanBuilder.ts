import { ZodError } from "zod";
import { OrchestratorError } from "../errors/OrchestratorError.js";
import { PLANNER_TEMPLATE } from "../llm/prompts.js";
import type { AgentRegistry } from "../registry/AgentRegistry.js";
import { PlanPayloadSchema, normalizePlan } from "../types/index.js";
import type { Oracle, Step } from "../types/index.js";

/** planner 可以安排、但只会模拟执行的代理 */
export const SIMULATED_AGENTS = [
  "FilterAgent",
  "BookingAgent",
  "MonitoringAgent",
  "UserInteractionAgent",
];

const SLACK_FAST_PATH =
  /^\s*post\s+a\s+message\s+on\s+(#[\w.-]+)\s+channel\s+in\s+slack\s+saying\s+(['"])(.+)\2\s*\.?\s*$/i;

export interface PlanBuilderOptions {
  oracle: Oracle;
  registry: AgentRegistry;
}

export class PlanBuilder {
  private readonly oracle: Oracle;

  private readonly registry: AgentRegistry;

  constructor(options: PlanBuilderOptions) {
    this.oracle = options.oracle;
    this.registry = options.registry;
  }

  async buildPlan(prompt: string): Promise<Step[]> {
    const fastPath = matchFastPath(prompt);
    if (fastPath) {
      console.info("[PlanBuilder] Using fast path for Slack post request");
      return fastPath;
    }

    const raw = await this.oracle.askStructured(PLANNER_TEMPLATE, {
      agents: this.describeAgents(),
      user_prompt: prompt,
    });

    try {
      const steps = normalizePlan(PlanPayloadSchema.parse(raw));
      console.info(`[PlanBuilder] Planned ${steps.length} step(s)`);
      return steps;
    } catch (error) {
      const message =
        error instanceof ZodError
          ? error.issues.map((issue) => issue.message).join("; ")
          : String(error);
      throw new OrchestratorError(
        "OraclePlanMalformed",
        `Planner response does not describe a plan (${message})`,
        { details: { raw }, cause: error }
      );
    }
  }

  private describeAgents(): string {
    const lines = this.registry.describe().map((agent) => {
      const status = agent.available ? "" : " (currently not configured)";
      return `- "${agent.kind}": ${agent.description}${status}`;
    });
    lines.push(
      `- ${SIMULATED_AGENTS.map((name) => `"${name}"`).join(", ")}: Other specialized agents.`
    );
    return lines.join("\n");
  }
}

/**
 * 对 "post a message on #chan channel in Slack saying '...'" 直接生成单步计划，不调用 LLM。
 */
export function matchFastPath(prompt: string): Step[] | null {
  const match = prompt.match(SLACK_FAST_PATH);
  if (!match) {
    return null;
  }
  const channel = match[1] ?? "";
  const message = match[3] ?? "";
  return [
    {
      agent: "Messaging",
      action: `Post "${message}" to ${channel}`,
      status: "pending",
    },
  ];
}
