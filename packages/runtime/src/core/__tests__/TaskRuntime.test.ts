import { beforeEach, describe, expect, it, vi } from "vitest";
import { PlanBuilder } from "../../planner/PlanBuilder.js";
import { AgentRegistry } from "../../registry/AgentRegistry.js";
import { FakeOracle, RecordingPublisher, createTestAgents } from "../../testing/fakes.js";
import { Executor } from "../Executor.js";
import { TaskRuntime } from "../TaskRuntime.js";

function createRuntime(oracle: FakeOracle) {
  const testAgents = createTestAgents();
  const registry = new AgentRegistry(testAgents.agents);
  const publisher = new RecordingPublisher();
  const runtime = new TaskRuntime({
    planBuilder: new PlanBuilder({ oracle, registry }),
    executor: new Executor({ registry, oracle, publisher, sleep: async () => undefined }),
    publisher,
  });
  return { ...testAgents, publisher, runtime };
}

describe("TaskRuntime", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("emits the full event sequence for a fast-path Slack post", async () => {
    const oracle = new FakeOracle();
    const { runtime, publisher, poster } = createRuntime(oracle);

    const result = await runtime.run(
      "Post a message on #general channel in Slack saying 'Hello team'",
      "task-1"
    );

    const action = 'Post "Hello team" to #general';
    expect(publisher.events).toEqual([
      { type: "log", agent: "Planner", message: "Creating an execution plan...", log_type: "info" },
      { type: "plan", steps: [{ agent: "Messaging", action, status: "pending" }] },
      { type: "status_update", step_action: action, status: "in-progress" },
      { type: "log", agent: "Messaging", message: `Starting: ${action}...`, log_type: "info" },
      { type: "status_update", step_action: action, status: "completed" },
      {
        type: "log",
        agent: "Messaging",
        message: "Message successfully posted to Slack channel #general.",
        log_type: "success",
      },
      { type: "log", agent: "System", message: "Task automation completed.", log_type: "success" },
    ]);
    expect(poster.posts).toEqual([{ channel: "#general", text: "Hello team" }]);
    expect(oracle.calls).toEqual([]);
    expect(result).toEqual({
      taskId: "task-1",
      prompt: "Post a message on #general channel in Slack saying 'Hello team'",
      outcome: "completed",
      steps: [{ agent: "Messaging", action, status: "completed" }],
      context: {},
    });
  });

  it("ends after a single error log when planning fails", async () => {
    const { runtime, publisher } = createRuntime(new FakeOracle({ planner: [] }));

    const result = await runtime.run("Do something vague", "task-2");

    expect(publisher.events).toEqual([
      { type: "log", agent: "Planner", message: "Creating an execution plan...", log_type: "info" },
      {
        type: "log",
        agent: "System",
        message:
          "Failed to create a task plan: OraclePlanMalformed: Planner response does not describe a plan (plan contained no steps)",
        log_type: "error",
      },
    ]);
    expect(result.outcome).toBe("plan_failed");
    expect(result.steps).toEqual([]);
  });

  it("reports an executor crash without rejecting", async () => {
    const publisher = new RecordingPublisher();
    const runtime = new TaskRuntime({
      planBuilder: {
        buildPlan: async () => [{ agent: "FilterAgent", action: "Filter", status: "pending" }],
      },
      executor: {
        executePlan: async () => {
          throw new Error("disk full");
        },
      },
      publisher,
    });

    const result = await runtime.run("Filter things", "task-3");

    expect(result.outcome).toBe("crashed");
    expect(result.error).toBe("disk full");
    expect(publisher.events.at(-1)).toEqual({
      type: "log",
      agent: "System",
      message: "Task execution aborted: disk full",
      log_type: "error",
    });
    expect(publisher.events.filter((event) => event.type === "plan")).toHaveLength(1);
  });
});
