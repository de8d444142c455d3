import { createMovement } from "@/lib/disk/distance";
import { splitAroundHead } from "@/lib/disk/partition";
import type { Direction, SeekResult } from "@/lib/disk/types";

export function runLOOK(requests: readonly number[], head: number, direction: Direction): SeekResult {
  const { lower, upper } = splitAroundHead(requests, head, "LOWER_INCLUSIVE");
  const movement = createMovement(head);

  if (direction === "INCREASING") {
    movement.visitAll(upper);
    movement.visitAll([...lower].reverse());
  } else {
    movement.visitAll([...lower].reverse());
    movement.visitAll(upper);
  }

  return movement.finish("LOOK");
}
