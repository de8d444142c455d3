export type ObjectiveSpec<T> = {
  key: string;
  getValue: (row: T) => number;
};

const EPS = 1e-9;

// Every objective is lower-is-better.
export function dominates<T>(candidate: T, target: T, objectives: Array<ObjectiveSpec<T>>): boolean {
  let strictlyBetter = false;

  for (const objective of objectives) {
    const candidateValue = objective.getValue(candidate);
    const targetValue = objective.getValue(target);

    if (candidateValue > targetValue + EPS) return false;
    if (candidateValue < targetValue - EPS) strictlyBetter = true;
  }

  return strictlyBetter;
}

export function paretoFront<T>(rows: T[], objectives: Array<ObjectiveSpec<T>>): T[] {
  return rows.filter((row, i) => !rows.some((other, j) => i !== j && dominates(other, row, objectives)));
}
