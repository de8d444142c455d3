import { createMovement } from "@/lib/disk/distance";
import type { SeekResult } from "@/lib/disk/types";

export function runFCFS(requests: readonly number[], head: number): SeekResult {
  const movement = createMovement(head);
  movement.visitAll(requests);
  return movement.finish("FCFS");
}
