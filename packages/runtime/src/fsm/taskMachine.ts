import { assign, fromPromise, setup } from "xstate";
import { describeError } from "../errors/OrchestratorError.js";
import type { EventPublisher, Step } from "../types/index.js";

export interface TaskMachineContext {
  taskId: string;
  prompt: string;
  steps: Step[];
  /** 规划失败或执行器崩溃时的错误描述 */
  error: string | null;
}

export interface TaskMachineInput {
  taskId: string;
  prompt: string;
}

export interface TaskMachineDeps {
  publisher: EventPublisher;
  buildPlan: (prompt: string) => Promise<Step[]>;
  /** 执行计划并返回最终的步骤状态 */
  executePlan: (steps: Step[]) => Promise<Step[]>;
}

/**
 * 单个任务的生命周期：planning → executing → completed，
 * 规划失败进入 planFailed，执行器意外崩溃进入 crashed。三个终态都是 final。
 */
export function createTaskMachine(deps: TaskMachineDeps) {
  const { publisher } = deps;

  return setup({
    types: {
      context: {} as TaskMachineContext,
      input: {} as TaskMachineInput,
    },
    actors: {
      planner: fromPromise<Step[], { prompt: string }>(({ input }) =>
        deps.buildPlan(input.prompt)
      ),
      executor: fromPromise<Step[], { steps: Step[] }>(({ input }) =>
        deps.executePlan(input.steps)
      ),
    },
  }).createMachine({
    id: "task",
    initial: "planning",
    context: ({ input }) => ({
      taskId: input.taskId,
      prompt: input.prompt,
      steps: [],
      error: null,
    }),
    states: {
      planning: {
        entry: () =>
          publisher.publish({
            type: "log",
            agent: "Planner",
            message: "Creating an execution plan...",
            log_type: "info",
          }),
        invoke: {
          src: "planner",
          input: ({ context }) => ({ prompt: context.prompt }),
          onDone: {
            target: "executing",
            actions: [
              assign({ steps: ({ event }) => event.output }),
              ({ event }) => publisher.publish({ type: "plan", steps: event.output }),
            ],
          },
          onError: {
            target: "planFailed",
            actions: assign({ error: ({ event }) => describeError(event.error) }),
          },
        },
      },
      executing: {
        invoke: {
          src: "executor",
          input: ({ context }) => ({ steps: context.steps }),
          onDone: {
            target: "completed",
            actions: assign({ steps: ({ event }) => event.output }),
          },
          onError: {
            target: "crashed",
            actions: assign({ error: ({ event }) => describeError(event.error) }),
          },
        },
      },
      completed: {
        type: "final",
        entry: () =>
          publisher.publish({
            type: "log",
            agent: "System",
            message: "Task automation completed.",
            log_type: "success",
          }),
      },
      planFailed: {
        type: "final",
        entry: ({ context }) =>
          publisher.publish({
            type: "log",
            agent: "System",
            message: `Failed to create a task plan: ${context.error ?? "unknown error"}`,
            log_type: "error",
          }),
      },
      crashed: {
        type: "final",
        entry: ({ context }) =>
          publisher.publish({
            type: "log",
            agent: "System",
            message: `Task execution aborted: ${context.error ?? "unknown error"}`,
            log_type: "error",
          }),
      },
    },
  });
}
