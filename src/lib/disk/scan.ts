import { createMovement } from "@/lib/disk/distance";
import { splitAroundHead } from "@/lib/disk/partition";
import type { Direction, SeekResult } from "@/lib/disk/types";

/**
 * Elevator sweep. The head runs to the edge of the travelled side before it
 * reverses, but the edge is only recorded when that side had work and the head
 * is not already parked on it.
 */
export function runSCAN(requests: readonly number[], head: number, direction: Direction, bound: number): SeekResult {
  const { lower, upper } = splitAroundHead(requests, head, "LOWER_INCLUSIVE");
  const movement = createMovement(head);

  if (direction === "INCREASING") {
    movement.visitAll(upper);
    if (upper.length > 0 && movement.cursor !== bound) {
      movement.visit(bound, true);
    }
    movement.visitAll([...lower].reverse());
  } else {
    movement.visitAll([...lower].reverse());
    if (lower.length > 0 && movement.cursor !== 0) {
      movement.visit(0, true);
    }
    movement.visitAll(upper);
  }

  return movement.finish("SCAN");
}
