import { describe, it, expect, vi } from "vitest";
import { ArchiveStateMachine, type ArchiveTransitionEvent } from "./state-machine.js";

describe("ArchiveStateMachine", () => {
  it("starts eligible", () => {
    const sm = new ArchiveStateMachine("/a");
    expect(sm.getState()).toBe("eligible");
    expect(sm.isTerminal()).toBe(false);
  });

  it("walks the success path", () => {
    const sm = new ArchiveStateMachine("/a");
    sm.transition("waiting");
    sm.transition("submitting");
    sm.transition("recorded");

    expect(sm.getState()).toBe("recorded");
    expect(sm.isTerminal()).toBe(true);
  });

  it("skipped is terminal", () => {
    const sm = new ArchiveStateMachine("/a");
    sm.transition("skipped");

    expect(sm.canTransition("waiting")).toBe(false);
    expect(() => sm.transition("waiting")).toThrow(
      "Invalid archive transition for /a: skipped -> waiting",
    );
  });

  it("cannot submit without waiting first", () => {
    const sm = new ArchiveStateMachine("/a");
    expect(() => sm.transition("submitting")).toThrow();
  });

  it("notifies listeners until unsubscribed", () => {
    const sm = new ArchiveStateMachine("/a");
    const events: ArchiveTransitionEvent[] = [];
    const listener = vi.fn((event: ArchiveTransitionEvent) => events.push(event));
    const unsubscribe = sm.onTransition(listener);

    sm.transition("waiting", "7 min delay");
    unsubscribe();
    sm.transition("submitting");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(events[0]).toMatchObject({
      path: "/a",
      from: "eligible",
      to: "waiting",
      reason: "7 min delay",
    });
  });
});
