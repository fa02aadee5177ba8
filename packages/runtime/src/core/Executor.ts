// 执行器：按顺序驱动计划中的每一步，选择代理执行，并在总线上广播状态与日志
import { addHours, format, formatISO, isValid, parseISO } from "date-fns";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import {
  OrchestratorError,
  agentNotConfigured,
  describeError,
} from "../errors/OrchestratorError.js";
import {
  CALENDAR_EXTRACTION_TEMPLATE,
  COMMUNICATION_EXTRACTION_TEMPLATE,
  MESSAGING_EXTRACTION_TEMPLATE,
  SEARCH_QUERY_TEMPLATE,
} from "../llm/prompts.js";
import { resolveAgentKind, type AgentRegistry } from "../registry/AgentRegistry.js";
import {
  CalendarArgsSchema,
  CommunicationArgsSchema,
  MessagingArgsSchema,
} from "../types/index.js";
import type {
  AgentAdapter,
  EventPublisher,
  KnownAgentKind,
  Oracle,
  PromptTemplate,
  Step,
} from "../types/index.js";
import type { TaskContext } from "./TaskContext.js";

/** 成功后写入上下文的固定键 */
export const CONTEXT_KEYS = {
  knowledge: "knowledge_answer",
  search: "search_result",
} as const;

export const DEFAULT_STEP_DELAY_MS = 1_000;
export const DEFAULT_SIMULATED_DELAY_MS = 2_000;

const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export interface StepOutcome {
  /** 给观察者看的结果摘要 */
  summary: string;
  contextUpdate?: { key: string; value: string };
}

/** 收到的 action 已用上下文插值过一次，处理器不再做插值 */
type StepHandler = (action: string, step: Step) => Promise<StepOutcome>;

export interface ExecutorOptions {
  registry: AgentRegistry;
  oracle: Oracle;
  publisher: EventPublisher;
  stepDelayMs?: number;
  simulatedDelayMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export class Executor {
  private readonly registry: AgentRegistry;

  private readonly oracle: Oracle;

  private readonly publisher: EventPublisher;

  private readonly stepDelayMs: number;

  private readonly simulatedDelayMs: number;

  private readonly now: () => Date;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly handlers: Record<KnownAgentKind, StepHandler>;

  constructor(options: ExecutorOptions) {
    this.registry = options.registry;
    this.oracle = options.oracle;
    this.publisher = options.publisher;
    this.stepDelayMs = options.stepDelayMs ?? DEFAULT_STEP_DELAY_MS;
    this.simulatedDelayMs = options.simulatedDelayMs ?? DEFAULT_SIMULATED_DELAY_MS;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? delay;
    this.handlers = {
      Messaging: (action) => this.runMessaging(action),
      Knowledge: (action) => this.runKnowledge(action),
      Search: (action) => this.runSearch(action),
      Calendar: (action) => this.runCalendar(action),
      Communication: (action) => this.runCommunication(action),
    };
  }

  /**
   * 依次执行全部步骤；单步失败只影响该步，不会中断后续步骤。
   */
  public async executePlan(task: TaskContext): Promise<Step[]> {
    const total = task.getSteps().length;
    for (let index = 0; index < total; index += 1) {
      await this.sleep(this.stepDelayMs);
      await this.executeStep(task, index);
    }
    return task.getSteps();
  }

  public async executeStep(task: TaskContext, index: number): Promise<Step> {
    const step = task.transition(index, "in-progress");
    this.publisher.publish({
      type: "status_update",
      step_action: step.action,
      status: "in-progress",
    });
    this.publisher.publish({
      type: "log",
      agent: step.agent,
      message: `Starting: ${step.action}...`,
      log_type: "info",
    });

    let outcome: StepOutcome;
    try {
      const action = task.interpolate(step.action);
      const kind = resolveAgentKind(step.agent);
      const handler = kind === "Other" ? this.simulate : this.handlers[kind];
      outcome = await handler(action, step);
    } catch (error) {
      const message = describeError(error);
      console.warn(`[Executor] Step ${index} (${step.agent}) failed: ${message}`);
      const failed = task.transition(index, "failed");
      this.publisher.publish({
        type: "status_update",
        step_action: failed.action,
        status: "failed",
      });
      this.publisher.publish({
        type: "log",
        agent: failed.agent,
        message: `Action failed. ${message}`,
        log_type: "error",
      });
      return failed;
    }

    if (outcome.contextUpdate) {
      task.set(outcome.contextUpdate.key, outcome.contextUpdate.value);
    }
    const completed = task.transition(index, "completed");
    this.publisher.publish({
      type: "status_update",
      step_action: completed.action,
      status: "completed",
    });
    this.publisher.publish({
      type: "log",
      agent: completed.agent,
      message: outcome.summary,
      log_type: "success",
    });
    return completed;
  }

  private simulate: StepHandler = async (action, step) => {
    console.info(`[Executor] Executing (simulated): ${step.agent} -> ${action}`);
    await this.sleep(this.simulatedDelayMs);
    return { summary: `Simulated ${step.agent} completed: ${action}` };
  };

  private async runMessaging(action: string): Promise<StepOutcome> {
    const messaging = requireAvailable(this.registry.get("Messaging"));
    const direct = messaging.parseAction(action);
    const args =
      direct ??
      (await this.extract(MessagingArgsSchema, MESSAGING_EXTRACTION_TEMPLATE, {
        action_text: action,
      }));
    const channel = args.channel.trim();
    await messaging.post(channel, args.message);
    return { summary: `Message successfully posted to Slack channel ${channel}.` };
  }

  private async runKnowledge(action: string): Promise<StepOutcome> {
    const knowledge = requireAvailable(this.registry.get("Knowledge"));
    const answer = await knowledge.run(action);
    return {
      summary: `Knowledge Base Answer: ${answer}`,
      contextUpdate: { key: CONTEXT_KEYS.knowledge, value: answer },
    };
  }

  private async runSearch(action: string): Promise<StepOutcome> {
    const search = requireAvailable(this.registry.get("Search"));
    const query = await this.oracle.askText(SEARCH_QUERY_TEMPLATE, {
      action_text: action,
    });
    const results = await search.run(query);
    return {
      summary: `Search for '${query}' found: ${results}`,
      contextUpdate: { key: CONTEXT_KEYS.search, value: results },
    };
  }

  private async runCalendar(action: string): Promise<StepOutcome> {
    const calendar = requireAvailable(this.registry.get("Calendar"));
    const args = await this.extract(CalendarArgsSchema, CALENDAR_EXTRACTION_TEMPLATE, {
      action_text: action,
      current_date: format(this.now(), "EEEE, yyyy-MM-dd"),
    });
    const link = await calendar.run({
      title: args.title,
      startTime: args.start_time,
      endTime: args.end_time ?? defaultEndTime(args.start_time),
    });
    return { summary: `Successfully created event. View: ${link}` };
  }

  private async runCommunication(action: string): Promise<StepOutcome> {
    const communication = requireAvailable(this.registry.get("Communication"));
    const args = await this.extract(
      CommunicationArgsSchema,
      COMMUNICATION_EXTRACTION_TEMPLATE,
      { action_text: action }
    );
    if (args.type === "sms") {
      const sid = await communication.sendSms(args.recipient, args.message);
      return { summary: `SMS to ${args.recipient} sent successfully. SID: ${sid}` };
    }
    const sid = await communication.makeCall(args.recipient, args.message);
    return { summary: `Call to ${args.recipient} initiated. SID: ${sid}` };
  }

  private async extract<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    template: PromptTemplate,
    variables: Record<string, string>
  ): Promise<T> {
    const raw = await this.oracle.askStructured(template, variables);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new OrchestratorError(
        "OraclePlanMalformed",
        `Oracle response for "${template.name}" is missing required fields (${formatIssues(parsed.error)})`,
        { details: { raw } }
      );
    }
    return parsed.data;
  }
}

function requireAvailable<T extends AgentAdapter>(adapter: T): T {
  if (!adapter.isAvailable()) {
    throw agentNotConfigured(adapter.kind, "credentials missing");
  }
  return adapter;
}

/**
 * 未给出结束时间时按一小时补齐；不带时区的输入保持不带时区的输出。
 * 不带时区的时间按墙上时钟计算（当作 UTC），与服务器所在时区无关。
 */
export function defaultEndTime(startTime: string): string {
  const naive = NAIVE_DATE_TIME.test(startTime);
  const start = naive ? new Date(`${startTime}Z`) : parseISO(startTime);
  if (!isValid(start)) {
    throw new OrchestratorError("OraclePlanMalformed", `Invalid start_time "${startTime}"`);
  }
  const end = addHours(start, 1);
  return naive ? end.toISOString().slice(0, 19) : formatISO(end);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "response"}: ${issue.message}`)
    .join("; ");
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
