import { beforeEach, describe, expect, it, vi } from "vitest";
import { EventBus } from "../../event/EventBus.js";
import { FakeOracle, createTestAgents, type TestAgents } from "../../testing/fakes.js";
import type { TaskEvent } from "../../types/index.js";
import { TaskService } from "../TaskService.js";

describe("TaskService", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("returns a task id immediately and completes in the background", async () => {
    const eventBus = new EventBus();
    const received: TaskEvent[] = [];
    const subscription = eventBus.events().subscribe((event) => received.push(event));
    const created: TestAgents[] = [];
    const createAgents = vi.fn(() => {
      const testAgents = createTestAgents();
      created.push(testAgents);
      return testAgents.agents;
    });
    const service = new TaskService({
      oracle: new FakeOracle(),
      publisher: eventBus,
      createAgents,
      sleep: async () => undefined,
    });

    const first = service.submit("Post a message on #general channel in Slack saying 'One'");
    const second = service.submit("Post a message on #general channel in Slack saying 'Two'");

    expect(first.taskId).toMatch(/^[\w-]{21}$/);
    expect(first.taskId).not.toBe(second.taskId);
    expect(service.activeCount()).toBe(2);

    const [firstResult, secondResult] = await Promise.all([first.completion, second.completion]);

    expect(firstResult.outcome).toBe("completed");
    expect(secondResult.outcome).toBe("completed");
    expect(createAgents).toHaveBeenCalledTimes(2);
    expect(created[0]?.poster.posts).toEqual([{ channel: "#general", text: "One" }]);
    expect(created[1]?.poster.posts).toEqual([{ channel: "#general", text: "Two" }]);
    expect(service.activeCount()).toBe(0);
    expect(
      received.filter((event) => event.type === "log" && event.agent === "System")
    ).toHaveLength(2);
    subscription.unsubscribe();
  });
});
