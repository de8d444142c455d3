import type { PolicyRow } from "@/lib/compare/types";

function f1(value: number): string {
  return value.toFixed(1);
}

function pct(part: number, whole: number): string {
  if (whole <= 0) return "0.0";
  return ((part / whole) * 100).toFixed(1);
}

export function generateExplanation(best: PolicyRow | null, second: PolicyRow | null, dominated: string[]): string[] {
  if (!best) return ["No policy results available for comparison."];

  const lines: string[] = [
    `${best.algorithm} moves the head ${best.totalDistance} cylinders in total (${f1(best.averageSeek)} per request).`,
  ];

  if (second) {
    const gap = second.totalDistance - best.totalDistance;
    if (gap === 0 && best.longestSeek !== second.longestSeek) {
      lines.push(
        `${second.algorithm} ties on distance; ${best.algorithm} has the shorter longest seek (${best.longestSeek} vs ${second.longestSeek}).`,
      );
    } else if (gap === 0 && best.reversals !== second.reversals) {
      lines.push(
        `${second.algorithm} ties on distance and longest seek; ${best.algorithm} reverses less often (${best.reversals} vs ${second.reversals}).`,
      );
    } else if (gap === 0) {
      lines.push(`${second.algorithm} ties on every measure; ${best.algorithm} is listed first.`);
    } else {
      lines.push(
        `Vs ${second.algorithm}: ${gap} fewer cylinders (${pct(gap, second.totalDistance)}% less travel), longest seek ${best.longestSeek} vs ${second.longestSeek}.`,
      );
    }
  }

  if (dominated.length > 0) {
    lines.push(`Dominated by another policy: ${dominated.join(", ")}.`);
  }

  return lines;
}
