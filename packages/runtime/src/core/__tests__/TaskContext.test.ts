import { describe, expect, it } from "vitest";
import { TaskContext, interpolate } from "../TaskContext.js";

describe("interpolate", () => {
  it("substitutes known keys", () => {
    expect(interpolate("Tell me about {search_result}", { search_result: "Paris" })).toBe(
      "Tell me about Paris"
    );
  });

  it("leaves the whole text unchanged when any key is missing", () => {
    expect(
      interpolate("{knowledge_answer} and {search_result}", { knowledge_answer: "Paris" })
    ).toBe("{knowledge_answer} and {search_result}");
  });

  it("does not resolve inherited object properties", () => {
    expect(interpolate("Value: {constructor}", {})).toBe("Value: {constructor}");
  });
});

describe("TaskContext", () => {
  function createTask() {
    const task = new TaskContext({ taskId: "task-1", prompt: "do things" });
    task.setPlan([
      { agent: "Knowledge", action: "Capital of France?", status: "pending" },
      { agent: "Messaging", action: 'Post "{knowledge_answer}" to #general', status: "pending" },
    ]);
    return task;
  }

  it("moves steps through pending, in-progress and a terminal status", () => {
    const task = createTask();

    expect(task.transition(0, "in-progress").status).toBe("in-progress");
    expect(task.transition(0, "completed").status).toBe("completed");
    expect(task.getSteps().map((step) => step.status)).toEqual(["completed", "pending"]);
  });

  it("rejects illegal transitions", () => {
    const task = createTask();

    expect(() => task.transition(1, "completed")).toThrowError(
      "Illegal status transition pending -> completed for step 1"
    );
    task.transition(1, "in-progress");
    task.transition(1, "failed");
    expect(() => task.transition(1, "in-progress")).toThrowError(
      "Illegal status transition failed -> in-progress for step 1"
    );
    expect(() => task.getStep(5)).toThrowError("Step 5 does not exist in task task-1");
  });

  it("keeps context values and interpolates with them", () => {
    const task = createTask();
    task.set("knowledge_answer", "Paris");

    expect(task.get("knowledge_answer")).toBe("Paris");
    expect(task.get("search_result")).toBeUndefined();
    expect(task.interpolate('Post "{knowledge_answer}" to #general')).toBe(
      'Post "Paris" to #general'
    );
    expect(task.getValues()).toEqual({ knowledge_answer: "Paris" });
  });

  it("does not expose its internal step list", () => {
    const task = createTask();
    const steps = task.getSteps();
    steps[0] = { agent: "Other", action: "changed", status: "failed" };

    expect(task.getStep(0).action).toBe("Capital of France?");
  });
});
