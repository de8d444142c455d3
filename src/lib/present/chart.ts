import type { SeekResult } from "@/lib/disk/types";

export type MovementPoint = {
  step: number;
  position: number;
  distance: number;
  synthetic: boolean;
  label: string;
};

const MIN_PLOT_WIDTH = 10;

/** One point per order entry, for a step-vs-position plot with per-move labels. */
export function buildMovementSeries(result: SeekResult): MovementPoint[] {
  const [start, ...rest] = result.order;
  const head: MovementPoint = { step: 0, position: start, distance: 0, synthetic: false, label: "start" };

  return [
    head,
    ...rest.map((position, index) => {
      const step = result.steps[index];
      const synthetic = step?.synthetic ?? false;
      const distance = step?.distance ?? 0;
      return {
        step: index + 1,
        position,
        distance,
        synthetic,
        label: synthetic ? `+${distance} boundary` : `+${distance}`,
      };
    }),
  ];
}

function columnFor(position: number, bound: number, width: number): number {
  if (bound <= 0) return 0;
  return Math.round((Math.min(Math.max(position, 0), bound) / bound) * (width - 1));
}

/**
 * Terminal rendition of the movement series: one row per step, the head drawn
 * at its scaled column. `@` marks the start, `#` a boundary or wrap visit.
 */
export function renderMovementPlot(series: readonly MovementPoint[], bound: number, width = 50): string[] {
  const plotWidth = Math.max(MIN_PLOT_WIDTH, Math.floor(width), String(bound).length + 1);
  const stepWidth = String(Math.max(0, series.length - 1)).length;
  const boundText = String(bound);
  const axis = `0${" ".repeat(plotWidth - 1 - boundText.length)}${boundText}`;

  const rows = series.map((point) => {
    const col = columnFor(point.position, bound, plotWidth);
    const marker = point.step === 0 ? "@" : point.synthetic ? "#" : "o";
    const track = `${" ".repeat(col)}${marker}${" ".repeat(plotWidth - 1 - col)}`;
    return `${String(point.step).padStart(stepWidth)} |${track}| ${point.position} (${point.label})`;
  });

  return [`${" ".repeat(stepWidth)} |${axis}|`, ...rows];
}
