export type ScrollPhase = "scrolling" | "stalled" | "recovering" | "done";

export type ScrollDoneReason = "target_reached" | "scroll_budget" | "exhausted";

export interface ScrollLimits {
  /** New records wanted from this harvest. */
  target: number;
  maxScrolls: number;
  /** Consecutive empty rounds before a recovery scroll is attempted. */
  stallThreshold: number;
  /** Consecutive empty rounds after which the feed is treated as exhausted. */
  maxConsecutiveNoNew: number;
}

export interface ScrollState {
  phase: ScrollPhase;
  rounds: number;
  collected: number;
  consecutiveNoNew: number;
  recoveries: number;
  doneReason: ScrollDoneReason | null;
}

export function initialScrollState(): ScrollState {
  return {
    phase: "scrolling",
    rounds: 0,
    collected: 0,
    consecutiveNoNew: 0,
    recoveries: 0,
    doneReason: null,
  };
}

function finish(state: ScrollState, reason: ScrollDoneReason): ScrollState {
  return { ...state, phase: "done", doneReason: reason };
}

/**
 * Folds the outcome of one extraction round into the scroll state.
 *
 * Scrolling -> Stalled on the first empty round, Stalled -> Recovering once the
 * empty streak reaches `stallThreshold`, any phase -> Scrolling as soon as a
 * round yields new records, and -> Done when the target, the scroll budget or
 * the empty-streak limit is reached. Done is absorbing.
 */
export function advanceScroll(state: ScrollState, newRecords: number, limits: ScrollLimits): ScrollState {
  if (state.phase === "done") return state;

  const rounds = state.rounds + 1;
  const collected = state.collected + Math.max(0, newRecords);
  let next: ScrollState;

  if (newRecords > 0) {
    next = { ...state, phase: "scrolling", rounds, collected, consecutiveNoNew: 0 };
  } else {
    const consecutiveNoNew = state.consecutiveNoNew + 1;
    if (consecutiveNoNew >= limits.stallThreshold) {
      next = {
        ...state,
        phase: "recovering",
        rounds,
        collected,
        consecutiveNoNew,
        recoveries: state.recoveries + 1,
      };
    } else {
      next = { ...state, phase: "stalled", rounds, collected, consecutiveNoNew };
    }
  }

  if (next.collected >= limits.target) return finish(next, "target_reached");
  if (next.consecutiveNoNew >= limits.maxConsecutiveNoNew) return finish(next, "exhausted");
  if (next.rounds >= limits.maxScrolls) return finish(next, "scroll_budget");
  return next;
}
