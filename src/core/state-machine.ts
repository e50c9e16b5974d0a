import type { EnvironmentRecord } from "../types/record.js";

/**
 * Environment life-cycle:
 *   uninitialized → kickstarted → ready
 *   ready → refreshing → ready
 */
export const PROVISION_STATES = ["uninitialized", "kickstarted", "refreshing", "ready"] as const;

export type ProvisionState = (typeof PROVISION_STATES)[number];

export type ProvisionEvent = "kickstart_succeeded" | "refresh_started" | "registered";

/** What a run will do: kickstart implies the refresh that follows it. */
export type ProvisionAction = "kickstart" | "refresh" | "none";

const TRANSITIONS: Record<ProvisionState, Partial<Record<ProvisionEvent, ProvisionState>>> = {
  uninitialized: { kickstart_succeeded: "kickstarted" },
  kickstarted: { registered: "ready" },
  ready: { refresh_started: "refreshing" },
  refreshing: { registered: "ready" },
};

export function initialState(record: EnvironmentRecord): ProvisionState {
  return record.setupTimestamp === null ? "uninitialized" : "ready";
}

/**
 * Pure function: given current state + event, return next state.
 * Throws on a transition the life-cycle does not allow.
 */
export function nextState(current: ProvisionState, event: ProvisionEvent): ProvisionState {
  const next = TRANSITIONS[current][event];
  if (!next) throw new Error(`Illegal transition: ${current} --${event}-->`);
  return next;
}

export function planRun(opts: { initialized: boolean; stale: boolean; forced: boolean }): ProvisionAction {
  if (!opts.initialized) return "kickstart";
  return opts.stale || opts.forced ? "refresh" : "none";
}
