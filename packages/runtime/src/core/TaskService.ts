import { nanoid } from "nanoid";
import { PlanBuilder } from "../planner/PlanBuilder.js";
import { AgentRegistry } from "../registry/AgentRegistry.js";
import type {
  AgentAdapterMap,
  EventPublisher,
  Oracle,
  TaskHandle,
  TaskSubmitter,
} from "../types/index.js";
import { Executor } from "./Executor.js";
import { TaskRuntime } from "./TaskRuntime.js";

export interface TaskServiceOptions {
  oracle: Oracle;
  publisher: EventPublisher;
  /** 每个任务调用一次，返回该任务独享的代理集合 */
  createAgents: () => AgentAdapterMap;
  stepDelayMs?: number;
  simulatedDelayMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 接收任务请求：立即返回 taskId，规划与执行在后台进行。
 */
export class TaskService implements TaskSubmitter {
  private readonly options: TaskServiceOptions;

  private readonly running = new Map<string, Promise<unknown>>();

  constructor(options: TaskServiceOptions) {
    this.options = options;
  }

  public submit(prompt: string): TaskHandle {
    const taskId = nanoid();
    const { oracle, publisher } = this.options;
    const registry = new AgentRegistry(this.options.createAgents());
    const runtime = new TaskRuntime({
      planBuilder: new PlanBuilder({ oracle, registry }),
      executor: new Executor({
        registry,
        oracle,
        publisher,
        ...(this.options.stepDelayMs !== undefined
          ? { stepDelayMs: this.options.stepDelayMs }
          : {}),
        ...(this.options.simulatedDelayMs !== undefined
          ? { simulatedDelayMs: this.options.simulatedDelayMs }
          : {}),
        ...(this.options.now ? { now: this.options.now } : {}),
        ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
      }),
      publisher,
    });

    console.info(`[TaskService] Task ${taskId} received`);
    const completion = runtime.run(prompt, taskId);
    this.running.set(taskId, completion);
    void completion.finally(() => this.running.delete(taskId));
    return { taskId, completion };
  }

  /** 仍在运行的任务数 */
  public activeCount(): number {
    return this.running.size;
  }
}
