import { describe, expect, it } from "vitest";
import type { TaskEvent } from "../../types/index.js";
import { EventBus } from "../EventBus.js";

const LOG: TaskEvent = { type: "log", agent: "System", message: "hello", log_type: "info" };
const STATUS: TaskEvent = { type: "status_update", step_action: "Filter", status: "in-progress" };

describe("EventBus", () => {
  it("delivers events to every subscriber in publish order", () => {
    const bus = new EventBus();
    const first: TaskEvent[] = [];
    const second: TaskEvent[] = [];
    bus.events().subscribe((event) => first.push(event));
    bus.events().subscribe((event) => second.push(event));

    bus.publish(LOG);
    bus.publish(STATUS);

    expect(first).toEqual([LOG, STATUS]);
    expect(second).toEqual([LOG, STATUS]);
  });

  it("filters by type and maps events", () => {
    const bus = new EventBus();
    const statuses: string[] = [];
    const kinds: string[] = [];
    bus.eventsOfType("status_update").subscribe((event) => statuses.push(event.status));
    bus.mapEvents((event) => event.type).subscribe((type) => kinds.push(type));

    bus.publish(LOG);
    bus.publish(STATUS);

    expect(statuses).toEqual(["in-progress"]);
    expect(kinds).toEqual(["log", "status_update"]);
  });

  it("detaches listeners on unsubscribe and drops events without observers", () => {
    const bus = new EventBus();
    const subscription = bus.events().subscribe(() => undefined);
    expect(bus.listenerCount()).toBe(1);

    subscription.unsubscribe();

    expect(bus.listenerCount()).toBe(0);
    expect(() => bus.publish(LOG)).not.toThrow();
  });
});
