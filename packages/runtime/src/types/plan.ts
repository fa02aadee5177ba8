import { z } from "zod";

export const StepStatusSchema = z.enum([
  "pending", // 等待执行
  "in-progress", // 正在执行
  "completed", // 执行成功
  "failed", // 执行失败
]);

export const PlannedStepSchema = z.object({
  /** 负责执行该步骤的代理名称，允许 planner 使用未实现的代理名 */
  agent: z.string().trim().min(1),
  /** 自由文本的动作描述，按各代理约定的语法书写 */
  action: z.string().trim().min(1),
});

export const StepSchema = PlannedStepSchema.extend({
  status: StepStatusSchema,
});

/**
 * 规划结果既可以是单个步骤对象，也可以是步骤数组，
 * 部分模型还会包一层 { steps: [...] }。
 */
export const PlanPayloadSchema = z.union([
  z.array(PlannedStepSchema).min(1, "plan contained no steps"),
  z.object({
    steps: z.array(PlannedStepSchema).min(1, "plan contained no steps"),
  }),
  PlannedStepSchema,
]);

const IsoDateTimeSchema = z
  .string()
  .trim()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/,
    "expected an ISO 8601 date-time"
  );

export const MessagingArgsSchema = z.object({
  channel: z.string().trim().min(1),
  message: z.string().min(1),
});

export const CalendarArgsSchema = z.object({
  title: z.string().trim().min(1),
  start_time: IsoDateTimeSchema,
  /** 缺省时由执行器按一小时时长补齐 */
  end_time: IsoDateTimeSchema.optional().nullable(),
});

export const CommunicationArgsSchema = z.object({
  type: z.enum(["call", "sms"]),
  recipient: z
    .string()
    .trim()
    .regex(/^\+[1-9]\d{1,14}$/, "recipient must be an E.164 phone number"),
  message: z.string().min(1),
});

export type StepStatus = z.infer<typeof StepStatusSchema>;
export type PlannedStep = z.infer<typeof PlannedStepSchema>;
export type Step = z.infer<typeof StepSchema>;
export type PlanPayload = z.infer<typeof PlanPayloadSchema>;
export type MessagingArgs = z.infer<typeof MessagingArgsSchema>;
export type CalendarArgs = z.infer<typeof CalendarArgsSchema>;
export type CommunicationArgs = z.infer<typeof CommunicationArgsSchema>;

/**
 * 把 planner 返回的任意合法形态统一成有序步骤数组，所有步骤初始为 pending。
 */
export function normalizePlan(payload: PlanPayload): Step[] {
  const planned = Array.isArray(payload)
    ? payload
    : "steps" in payload
    ? payload.steps
    : [payload];
  return planned.map((step) => ({
    agent: step.agent,
    action: step.action,
    status: "pending",
  }));
}
