import { describe, it, expect, vi } from "vitest";
import { EventBus, isEventOfType, type OrchestratorEvent } from "./events";

const started: OrchestratorEvent = { type: "run_started", runId: "run-1", ts: 1, operationCount: 2 };
const completed: OrchestratorEvent = { type: "run_completed", runId: "run-1", ts: 2, durationMs: 5 };

describe("EventBus", () => {
  it("delivers to subscribers in subscription order", () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.subscribe(() => order.push("first"));
    bus.subscribe(() => order.push("second"));
    bus.emit(started);
    expect(order).toEqual(["first", "second"]);
  });

  it("stops delivery after unsubscribe", () => {
    const bus = new EventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);
    bus.emit(started);
    unsubscribe();
    bus.emit(started);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount).toBe(0);
  });

  it("filters typed listeners and supports off()", () => {
    const bus = new EventBus();
    const durations: number[] = [];
    const listener = (event: { durationMs: number }) => durations.push(event.durationMs);
    bus.on("run_completed", listener);
    bus.emit(started);
    bus.emit(completed);
    bus.off("run_completed", listener);
    bus.emit(completed);
    expect(durations).toEqual([5]);
  });

  it("registers a typed listener once however often on() is called", () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on("run_completed", listener);
    bus.on("run_completed", listener);
    expect(bus.listenerCount).toBe(1);

    bus.emit(completed);
    bus.off("run_completed", listener);
    bus.emit(completed);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount).toBe(0);
  });

  it("keeps delivering when a listener throws and reports it as a log event", () => {
    const bus = new EventBus();
    const received: OrchestratorEvent[] = [];
    bus.subscribe(() => {
      throw new Error("listener broke");
    });
    bus.subscribe((event) => received.push(event));

    expect(() => bus.emit(started)).not.toThrow();

    expect(received.map((event) => event.type)).toEqual(["log", "run_started"]);
    const [log] = received;
    expect(log).toMatchObject({
      type: "log",
      runId: "run-1",
      level: "error",
      message: 'Listener for "run_started" threw: listener broke',
    });
  });

  it("hands listener errors to onListenerError when given", () => {
    const onListenerError = vi.fn();
    const bus = new EventBus(onListenerError);
    const failure = new Error("nope");
    const other = vi.fn();
    bus.subscribe(() => {
      throw failure;
    });
    bus.subscribe(other);
    bus.emit(started);
    expect(onListenerError).toHaveBeenCalledWith(failure, started);
    expect(other).toHaveBeenCalledTimes(1);
  });

  it("publishes a log event when onListenerError itself throws", () => {
    const bus = new EventBus(() => {
      throw new Error("handler broke");
    });
    const received: OrchestratorEvent[] = [];
    bus.subscribe(() => {
      throw new Error("listener broke");
    });
    bus.subscribe((event) => received.push(event));

    expect(() => bus.emit(started)).not.toThrow();

    expect(received.map((event) => event.type)).toEqual(["log", "run_started"]);
    expect(received[0]).toMatchObject({
      type: "log",
      runId: "run-1",
      level: "error",
      message: "Listener error handler threw: handler broke",
    });
  });
});

describe("isEventOfType", () => {
  it("narrows on the type field", () => {
    expect(isEventOfType(completed, "run_completed")).toBe(true);
    expect(isEventOfType(completed, "run_started")).toBe(false);
  });
});
