import { createMovement } from "@/lib/disk/distance";
import { splitAroundHead } from "@/lib/disk/partition";
import type { Direction, SeekResult } from "@/lib/disk/types";

/**
 * Circular sweep. After the travelled edge the head returns to the opposite
 * edge and keeps sweeping the same way. The return leg always costs `bound`,
 * once per run, whatever the distribution of requests.
 */
export function runCSCAN(requests: readonly number[], head: number, direction: Direction, bound: number): SeekResult {
  const movement = createMovement(head);
  if (requests.length === 0) return movement.finish("CSCAN");

  if (direction === "INCREASING") {
    const { lower, upper } = splitAroundHead(requests, head, "UPPER_INCLUSIVE");
    movement.visitAll(upper);
    if (movement.cursor !== bound) movement.visit(bound, true);
    movement.visit(0, true);
    movement.visitAll(lower);
  } else {
    const { lower, upper } = splitAroundHead(requests, head, "LOWER_INCLUSIVE");
    movement.visitAll([...lower].reverse());
    if (movement.cursor !== 0) movement.visit(0, true);
    movement.visit(bound, true);
    movement.visitAll([...upper].reverse());
  }

  return movement.finish("CSCAN");
}
