import { Fenwick } from "@/lib/dsa/fenwick";
import type { SeekResult, SeekStep } from "@/lib/disk/types";

export interface StepRange {
  l: number;
  r: number;
}

export interface SeekRangeStats {
  steps: number;
  distance: number;
  averageSeek: number;
  longestSeek: number;
  reversals: number;
  syntheticSteps: number;
}

const EMPTY_STATS: SeekRangeStats = {
  steps: 0,
  distance: 0,
  averageSeek: 0,
  longestSeek: 0,
  reversals: 0,
  syntheticSteps: 0,
};

function sign(step: SeekStep): number {
  return Math.sign(step.to - step.from);
}

/** Counts heading changes; zero-length moves keep the previous heading. */
export function countReversals(steps: readonly SeekStep[]): number {
  let heading = 0;
  let reversals = 0;
  for (const step of steps) {
    const next = sign(step);
    if (next === 0) continue;
    if (heading !== 0 && next !== heading) reversals += 1;
    heading = next;
  }
  return reversals;
}

function clampStep(value: number, maxStep: number): number {
  return Math.max(0, Math.min(Math.floor(value), Math.max(0, maxStep)));
}

export function clampStepRange(range: StepRange, maxStep: number): StepRange {
  const left = clampStep(Math.min(range.l, range.r), maxStep);
  const right = clampStep(Math.max(range.l, range.r), maxStep);
  return { l: left, r: right };
}

export class SeekAnalytics {
  private steps: SeekStep[];

  private distances: Fenwick;

  private synthetic: Fenwick;

  constructor(result: SeekResult) {
    this.steps = result.steps.map((step) => ({ ...step }));
    this.distances = new Fenwick(this.steps.map((step) => step.distance));
    this.synthetic = new Fenwick(this.steps.map((step) => (step.synthetic ? 1 : 0)));
  }

  get length(): number {
    return this.steps.length;
  }

  get totalDistance(): number {
    return this.distances.sum(this.steps.length - 1);
  }

  distanceUntil(stepIndex: number): number {
    return this.distances.sum(stepIndex);
  }

  /** Stats over zero-based step indices `l..r`, inclusive, clamped to the run. */
  getRangeStats(l: number, r: number): SeekRangeStats {
    if (this.steps.length === 0) return { ...EMPTY_STATS };

    const { l: left, r: right } = clampStepRange({ l, r }, this.steps.length - 1);
    const slice = this.steps.slice(left, right + 1);
    const distance = this.distances.rangeSum(left, right);

    return {
      steps: slice.length,
      distance,
      averageSeek: slice.length > 0 ? distance / slice.length : 0,
      longestSeek: slice.reduce((max, step) => Math.max(max, step.distance), 0),
      reversals: countReversals(slice),
      syntheticSteps: this.synthetic.rangeSum(left, right),
    };
  }
}

export function buildSeekAnalytics(result: SeekResult): SeekAnalytics {
  return new SeekAnalytics(result);
}
