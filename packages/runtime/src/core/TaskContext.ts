import type { Step, StepStatus, TaskContextValues } from "../types/index.js";

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** 各状态允许的下一个状态，终态没有出边 */
const STEP_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  pending: ["in-progress"],
  "in-progress": ["completed", "failed"],
  completed: [],
  failed: [],
};

export interface TaskContextOptions {
  taskId: string;
  prompt: string;
  values?: TaskContextValues;
}

/**
 * 单个任务的可变状态：步骤列表与跨步骤上下文。只由该任务的执行器读写。
 */
export class TaskContext {
  public readonly taskId: string;

  public readonly prompt: string;

  private steps: Step[] = [];

  private values: TaskContextValues;

  constructor(options: TaskContextOptions) {
    this.taskId = options.taskId;
    this.prompt = options.prompt;
    this.values = { ...(options.values ?? {}) };
  }

  public setPlan(steps: Step[]): void {
    this.steps = steps.map((step) => ({ ...step }));
  }

  public getSteps(): Step[] {
    return this.steps.map((step) => ({ ...step }));
  }

  public getStep(index: number): Step {
    const step = this.steps[index];
    if (!step) {
      throw new Error(`Step ${index} does not exist in task ${this.taskId}`);
    }
    return { ...step };
  }

  // 按状态机推进步骤状态，非法跃迁直接抛错
  public transition(index: number, next: StepStatus): Step {
    const current = this.getStep(index);
    if (!STEP_TRANSITIONS[current.status].includes(next)) {
      throw new Error(
        `Illegal status transition ${current.status} -> ${next} for step ${index}`
      );
    }
    const updated: Step = { ...current, status: next };
    this.steps = this.steps.map((step, i) => (i === index ? updated : step));
    return { ...updated };
  }

  public set(key: string, value: string): void {
    this.values = { ...this.values, [key]: value };
  }

  public get(key: string): string | undefined {
    return Object.hasOwn(this.values, key) ? this.values[key] : undefined;
  }

  public getValues(): TaskContextValues {
    return { ...this.values };
  }

  public interpolate(text: string): string {
    return interpolate(text, this.values);
  }
}

/**
 * 用上下文替换 {key} 占位符；只要有一个键缺失就原样返回整段文本。
 */
export function interpolate(text: string, values: TaskContextValues): string {
  let missing = false;
  const rendered = text.replace(PLACEHOLDER_PATTERN, (match, key: string) => {
    const value = Object.hasOwn(values, key) ? values[key] : undefined;
    if (value === undefined) {
      missing = true;
      return match;
    }
    return value;
  });
  return missing ? text : rendered;
}
