import { describe, expect, it } from "vitest";
import { nextTimestamp } from "../src/core/clock.js";
import { initialState, nextState, planRun } from "../src/core/state-machine.js";

describe("state-machine", () => {
  it("starts uninitialized without a timestamp and ready with one", () => {
    expect(initialState({ speciesKind: "alpha", setupTimestamp: null, activationCommand: null })).toBe("uninitialized");
    expect(initialState({ speciesKind: "alpha", setupTimestamp: 1, activationCommand: "x" })).toBe("ready");
  });

  it("walks uninitialized → kickstarted → ready", () => {
    const kicked = nextState("uninitialized", "kickstart_succeeded");
    expect(kicked).toBe("kickstarted");
    expect(nextState(kicked, "registered")).toBe("ready");
  });

  it("walks ready → refreshing → ready", () => {
    const refreshing = nextState("ready", "refresh_started");
    expect(refreshing).toBe("refreshing");
    expect(nextState(refreshing, "registered")).toBe("ready");
  });

  it("rejects transitions outside the life-cycle", () => {
    expect(() => nextState("uninitialized", "registered")).toThrow("Illegal transition: uninitialized --registered-->");
    expect(() => nextState("ready", "kickstart_succeeded")).toThrow("Illegal transition");
    expect(() => nextState("refreshing", "refresh_started")).toThrow("Illegal transition");
  });

  it("plans a kickstart whenever the environment was never set up", () => {
    expect(planRun({ initialized: false, stale: false, forced: false })).toBe("kickstart");
    expect(planRun({ initialized: false, stale: true, forced: true })).toBe("kickstart");
  });

  it("plans a refresh when stale or forced", () => {
    expect(planRun({ initialized: true, stale: true, forced: false })).toBe("refresh");
    expect(planRun({ initialized: true, stale: false, forced: true })).toBe("refresh");
  });

  it("plans nothing when fresh and not forced", () => {
    expect(planRun({ initialized: true, stale: false, forced: false })).toBe("none");
  });
});

describe("clock", () => {
  it("uses the clock for the first registration", () => {
    expect(nextTimestamp(() => 1_000.7, null)).toBe(1_000);
  });

  it("uses the clock when it is ahead of the previous timestamp", () => {
    expect(nextTimestamp(() => 5_000, 1_000)).toBe(5_000);
  });

  it("bumps past the previous timestamp when the clock lags", () => {
    expect(nextTimestamp(() => 1_000, 1_000)).toBe(1_001);
    expect(nextTimestamp(() => 10, 1_000)).toBe(1_001);
  });
});
