/**
 * Instance lifecycle state machine: pure logic, no dependencies.
 *
 * Single source of truth for valid instance transitions. The LifecycleManager
 * and the registry both go through assertTransition(); nothing else changes
 * an instance's state.
 *
 * `unhealthy` absorbs failures from starting, health checking and running.
 * The only way out of it is an explicit stop.
 */
import { OrchestratorError } from "./errors.js";

export const INSTANCE_STATES = [
  "planned",
  "starting",
  "health_checking",
  "running",
  "unhealthy",
  "stopping",
  "stopped",
] as const;

export type InstanceState = (typeof INSTANCE_STATES)[number];

/**
 * ```
 * planned         → starting
 * starting        → health_checking, unhealthy
 * health_checking → running, unhealthy, stopping
 * running         → unhealthy, stopping
 * unhealthy       → stopping
 * stopping        → stopped, unhealthy
 * stopped         → (terminal)
 * ```
 *
 * health_checking → stopping covers a cancelled start. stopping → unhealthy
 * covers a stop that failed and left the container behind.
 */
export const VALID_TRANSITIONS: Record<InstanceState, readonly InstanceState[]> = {
  planned: ["starting"],
  starting: ["health_checking", "unhealthy"],
  health_checking: ["running", "unhealthy", "stopping"],
  running: ["unhealthy", "stopping"],
  unhealthy: ["stopping"],
  stopping: ["stopped", "unhealthy"],
  stopped: [],
};

export function isValidTransition(from: InstanceState, to: InstanceState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Returns `to` when the move is legal; throws otherwise. */
export function assertTransition(from: InstanceState, to: InstanceState): InstanceState {
  if (!isValidTransition(from, to)) throw new InvalidTransitionError(from, to);
  return to;
}

/** Thrown when code attempts a transition not in the valid graph. */
export class InvalidTransitionError extends OrchestratorError {
  readonly name = "InvalidTransitionError" as const;
  readonly code = "invalid_transition";
  constructor(from: InstanceState, to: InstanceState) {
    super(`Invalid instance transition: ${from} → ${to}`);
  }
}
