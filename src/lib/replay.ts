import type { SeekResult, SeekStep } from "@/lib/disk/types";

export type ReplayView = {
  t: number;
  cursor: number;
  visited: number[];
  pending: number[];
  distanceSoFar: number;
  lastStep: SeekStep | null;
  done: boolean;
};

export function getReplayMax(result: SeekResult): number {
  return result.steps.length;
}

/** Head state after `t` moves; `t` is clamped to `[0, steps]`. */
export function getReplayViewState(result: SeekResult, requestedT: number): ReplayView {
  const replayMax = getReplayMax(result);
  const t = Math.max(0, Math.min(Math.floor(requestedT), replayMax));
  const taken = result.steps.slice(0, t);

  return {
    t,
    cursor: result.order[t] ?? result.order[0],
    visited: result.order.slice(1, t + 1),
    pending: result.order.slice(t + 1),
    distanceSoFar: taken.reduce((sum, step) => sum + step.distance, 0),
    lastStep: taken.length > 0 ? taken[taken.length - 1] : null,
    done: t === replayMax,
  };
}
