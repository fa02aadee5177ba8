import { nanoid } from "nanoid";
import { createActor } from "xstate";
import { describeError } from "../errors/OrchestratorError.js";
import { createTaskMachine } from "../fsm/taskMachine.js";
import type { PlanBuilder } from "../planner/PlanBuilder.js";
import type {
  EventPublisher,
  TaskOutcome,
  TaskRunResult,
} from "../types/index.js";
import type { Executor } from "./Executor.js";
import { TaskContext } from "./TaskContext.js";

export interface TaskRuntimeOptions {
  planBuilder: Pick<PlanBuilder, "buildPlan">;
  executor: Pick<Executor, "executePlan">;
  publisher: EventPublisher;
}

function outcomeFor(state: unknown): TaskOutcome {
  switch (state) {
    case "completed":
      return "completed";
    case "planFailed":
      return "plan_failed";
    default:
      return "crashed";
  }
}

/**
 * 驱动单个任务：先规划再执行，所有事件通过 publisher 依序发出。
 * 返回的 Promise 不会因为规划或执行失败而 reject。
 */
export class TaskRuntime {
  private readonly planBuilder: Pick<PlanBuilder, "buildPlan">;

  private readonly executor: Pick<Executor, "executePlan">;

  private readonly publisher: EventPublisher;

  constructor(options: TaskRuntimeOptions) {
    this.planBuilder = options.planBuilder;
    this.executor = options.executor;
    this.publisher = options.publisher;
  }

  public async run(prompt: string, taskId: string = nanoid()): Promise<TaskRunResult> {
    const task = new TaskContext({ taskId, prompt });
    const machine = createTaskMachine({
      publisher: this.publisher,
      buildPlan: (text) => this.planBuilder.buildPlan(text),
      executePlan: (steps) => {
        task.setPlan(steps);
        return this.executor.executePlan(task);
      },
    });
    const actor = createActor(machine, { input: { taskId, prompt } });

    return new Promise<TaskRunResult>((resolve) => {
      const finish = (outcome: TaskOutcome, error: string | null) => {
        const result: TaskRunResult = {
          taskId,
          prompt,
          outcome,
          steps: task.getSteps(),
          context: task.getValues(),
        };
        if (error) {
          result.error = error;
        }
        console.info(`[TaskRuntime] Task ${taskId} finished with ${outcome}`);
        resolve(result);
      };

      const subscription = actor.subscribe({
        next: (snapshot) => {
          if (snapshot.status !== "done") {
            return;
          }
          subscription.unsubscribe();
          finish(outcomeFor(snapshot.value), snapshot.context.error);
        },
        error: (error) => {
          subscription.unsubscribe();
          const message = describeError(error);
          console.error(`[TaskRuntime] Task ${taskId} crashed`, message);
          this.publisher.publish({
            type: "log",
            agent: "System",
            message: `Task execution aborted: ${message}`,
            log_type: "error",
          });
          finish("crashed", message);
        },
      });

      actor.start();
    });
  }
}
