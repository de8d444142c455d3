import type { DiskAlgorithm, SeekResult, SeekStep } from "@/lib/disk/types";

export function seekDistance(from: number, to: number): number {
  return Math.abs(to - from);
}

export function totalSeekDistance(order: readonly number[]): number {
  let total = 0;
  for (let index = 1; index < order.length; index += 1) {
    total += seekDistance(order[index - 1], order[index]);
  }
  return total;
}

export type Movement = {
  readonly cursor: number;
  visit: (position: number, synthetic?: boolean) => void;
  visitAll: (positions: readonly number[]) => void;
  finish: (algorithm: DiskAlgorithm) => SeekResult;
};

/**
 * Single place where seek cost is accrued. Every strategy walks the head through
 * this tracker, so `totalDistance` always equals the summed gaps of `order`.
 */
export function createMovement(head: number): Movement {
  const order: number[] = [head];
  const steps: SeekStep[] = [];
  let cursor = head;
  let totalDistance = 0;

  const visit = (position: number, synthetic = false) => {
    const distance = seekDistance(cursor, position);
    steps.push({
      step: steps.length + 1,
      from: cursor,
      to: position,
      distance,
      synthetic,
    });
    order.push(position);
    totalDistance += distance;
    cursor = position;
  };

  return {
    get cursor() {
      return cursor;
    },
    visit,
    visitAll: (positions) => {
      positions.forEach((position) => visit(position));
    },
    finish: (algorithm) => ({
      algorithm,
      order: [...order],
      steps: steps.map((step) => ({ ...step })),
      totalDistance,
    }),
  };
}
