import { createMovement, seekDistance } from "@/lib/disk/distance";
import type { SeekResult } from "@/lib/disk/types";

type Candidate = {
  index: number;
  position: number;
  prev: Candidate | null;
  next: Candidate | null;
};

// Pending requests in original queue order; removal never reorders survivors.
class CandidateList {
  head: Candidate | null = null;

  tail: Candidate | null = null;

  size = 0;

  append(node: Candidate) {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.size += 1;
  }

  remove(node: Candidate) {
    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    if (this.head === node) this.head = node.next;
    if (this.tail === node) this.tail = node.prev;
    node.prev = null;
    node.next = null;
    this.size = Math.max(0, this.size - 1);
  }

  nearest(cursor: number): Candidate | null {
    let best: Candidate | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (let node = this.head; node; node = node.next) {
      const distance = seekDistance(cursor, node.position);
      // strict comparison keeps the leftmost candidate on ties
      if (distance < bestDistance) {
        best = node;
        bestDistance = distance;
      }
    }
    return best;
  }
}

export function runSSTF(requests: readonly number[], head: number): SeekResult {
  const pending = new CandidateList();
  requests.forEach((position, index) => {
    pending.append({ index, position, prev: null, next: null });
  });

  const movement = createMovement(head);
  while (pending.size > 0) {
    const next = pending.nearest(movement.cursor);
    if (!next) {
      throw new Error("SSTF invariant broken: missing candidate");
    }
    pending.remove(next);
    movement.visit(next.position);
  }

  return movement.finish("SSTF");
}
