import { InvalidTransitionError } from "../core/errors";
import { STAGE_NAMES, type RunState, type StageName } from "../core/schemas";

/** The single forward successor of each state. */
const FORWARD: Record<RunState, RunState | null> = {
  CREATED: "FETCHING",
  FETCHING: "CLEANING",
  CLEANING: "SLICING",
  SLICING: "TAGGING",
  TAGGING: "GENERATING",
  GENERATING: "COMPLETE",
  COMPLETE: null,
  FAILED: null,
};

export const STAGE_STATE: Record<StageName, RunState> = {
  fetch: "FETCHING",
  clean: "CLEANING",
  slice: "SLICING",
  tag: "TAGGING",
  generate: "GENERATING",
};

export function isInProgress(state: RunState): boolean {
  return state !== "CREATED" && state !== "COMPLETE" && state !== "FAILED";
}

export function isTerminal(state: RunState): boolean {
  return state === "COMPLETE" || state === "FAILED";
}

export function canTransition(from: RunState, to: RunState): boolean {
  if (to === "FAILED") return isInProgress(from);
  return FORWARD[from] === to;
}

/**
 * Validate a transition, returning the new state.
 * @throws InvalidTransitionError
 */
export function transition(from: RunState, to: RunState): RunState {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
  return to;
}

/** The stage that runs while the run is in `state`, if any. */
export function stageForState(state: RunState): StageName | null {
  return STAGE_NAMES.find((stage) => STAGE_STATE[stage] === state) ?? null;
}
