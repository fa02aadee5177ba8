import type { Observable } from "rxjs";
import type { Step, StepStatus } from "./plan.js";

export {
  CalendarArgsSchema,
  CommunicationArgsSchema,
  MessagingArgsSchema,
  PlanPayloadSchema,
  PlannedStepSchema,
  StepSchema,
  StepStatusSchema,
  normalizePlan,
} from "./plan.js";

export type {
  CalendarArgs,
  CommunicationArgs,
  MessagingArgs,
  PlanPayload,
  PlannedStep,
  Step,
  StepStatus,
} from "./plan.js";

export const KNOWN_AGENT_KINDS = [
  "Messaging",
  "Knowledge",
  "Search",
  "Calendar",
  "Communication",
] as const;

export type KnownAgentKind = (typeof KNOWN_AGENT_KINDS)[number];

/** Other 代表 planner 声明了但没有真实实现的代理，只做模拟执行 */
export type AgentKind = KnownAgentKind | "Other";

export type LogType = "info" | "success" | "error";

export interface PlanEvent {
  type: "plan";
  steps: Step[];
}

export interface StatusUpdateEvent {
  type: "status_update";
  step_action: string;
  status: Exclude<StepStatus, "pending">;
}

export interface LogEvent {
  type: "log";
  agent: string;
  message: string;
  log_type: LogType;
}

export type TaskEvent = PlanEvent | StatusUpdateEvent | LogEvent;

export type TaskEventType = TaskEvent["type"];

export interface EventPublisher {
  /** 尽力投递给当前所有观察者，不等待、不回压 */
  publish(event: TaskEvent): void;
}

export interface TaskEventStream {
  events(): Observable<TaskEvent>;
}

/** 跨步骤共享的上下文，键为符号名，值为前序步骤的文本结果 */
export type TaskContextValues = Record<string, string>;

export type TaskOutcome = "completed" | "plan_failed" | "crashed";

export interface TaskRunResult {
  taskId: string;
  prompt: string;
  outcome: TaskOutcome;
  steps: Step[];
  context: TaskContextValues;
  error?: string;
}

export interface TaskHandle {
  taskId: string;
  /** 任务结束后 resolve，永不 reject */
  completion: Promise<TaskRunResult>;
}

export interface TaskSubmitter {
  submit(prompt: string): TaskHandle;
}

export type PromptVariables = Record<string, string>;

export interface PromptTemplate {
  /** 模板名称，用于日志与错误信息 */
  name: string;
  /** 带 {placeholder} 占位符的模板正文 */
  text: string;
  /** 可选的 system 提示 */
  system?: string;
}

export interface Oracle {
  isConfigured(): boolean;
  render(template: PromptTemplate, variables: PromptVariables): string;
  askStructured(
    template: PromptTemplate,
    variables: PromptVariables
  ): Promise<unknown>;
  askText(template: PromptTemplate, variables: PromptVariables): Promise<string>;
}

export interface AgentAdapter {
  /** 适配器处理的代理类型 */
  readonly kind: KnownAgentKind;
  /** 给 planner 看的能力说明，包括可接受的 action 语法 */
  readonly description: string;
  /** 构造时根据凭据决定，缺失凭据时为 false 但不影响进程启动 */
  isAvailable(): boolean;
}

export interface MessagingAdapter extends AgentAdapter {
  readonly kind: "Messaging";
  parseAction(action: string): { channel: string; message: string } | null;
  run(action: string): Promise<string>;
  post(channel: string, message: string): Promise<string>;
}

export interface KnowledgeAdapter extends AgentAdapter {
  readonly kind: "Knowledge";
  run(query: string): Promise<string>;
  addKnowledge(name: string, content: string): Promise<string>;
}

export interface SearchAdapter extends AgentAdapter {
  readonly kind: "Search";
  run(query: string): Promise<string>;
}

export interface CalendarEventDetails {
  title: string;
  startTime: string;
  endTime: string;
}

export interface CalendarAdapter extends AgentAdapter {
  readonly kind: "Calendar";
  run(event: CalendarEventDetails): Promise<string>;
}

export interface CommunicationAdapter extends AgentAdapter {
  readonly kind: "Communication";
  sendSms(recipient: string, message: string): Promise<string>;
  makeCall(recipient: string, message: string): Promise<string>;
}

export interface AgentAdapterMap {
  Messaging: MessagingAdapter;
  Knowledge: KnowledgeAdapter;
  Search: SearchAdapter;
  Calendar: CalendarAdapter;
  Communication: CommunicationAdapter;
}
