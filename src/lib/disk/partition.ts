export type SplitPivot = "LOWER_INCLUSIVE" | "UPPER_INCLUSIVE";

export type HeadSplit = {
  lower: number[];
  upper: number[];
};

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Splits the queue on the head position. The pivot decides which side keeps
 * requests sitting exactly on the head. Both sides come back ascending.
 */
export function splitAroundHead(requests: readonly number[], head: number, pivot: SplitPivot): HeadSplit {
  const lower: number[] = [];
  const upper: number[] = [];

  for (const position of requests) {
    const goesLow = pivot === "LOWER_INCLUSIVE" ? position <= head : position < head;
    if (goesLow) lower.push(position);
    else upper.push(position);
  }

  return { lower: sortAscending(lower), upper: sortAscending(upper) };
}
