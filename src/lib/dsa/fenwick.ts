/** Prefix sums over a fixed array with point updates. */
export class Fenwick {
  private n: number;

  private tree: number[];

  private data: number[];

  constructor(values: readonly number[]) {
    this.n = values.length;
    this.tree = new Array(this.n + 1).fill(0);
    this.data = new Array(this.n).fill(0);
    values.forEach((value, index) => this.add(index, value));
  }

  add(i: number, delta: number) {
    const idx = Math.floor(i);
    if (idx < 0 || idx >= this.n) return;
    const change = Number(delta) || 0;
    if (change === 0) return;
    this.data[idx] += change;

    let bitIndex = idx + 1;
    while (bitIndex <= this.n) {
      this.tree[bitIndex] += change;
      bitIndex += bitIndex & -bitIndex;
    }
  }

  sum(i: number): number {
    if (this.n === 0) return 0;
    const idx = Math.min(Math.floor(i), this.n - 1);
    if (idx < 0) return 0;

    let total = 0;
    let bitIndex = idx + 1;
    while (bitIndex > 0) {
      total += this.tree[bitIndex];
      bitIndex -= bitIndex & -bitIndex;
    }
    return total;
  }

  rangeSum(l: number, r: number): number {
    if (this.n === 0) return 0;
    const left = Math.max(0, Math.min(Math.floor(l), this.n - 1));
    const right = Math.max(0, Math.min(Math.floor(r), this.n - 1));
    if (left > right) return 0;
    return this.sum(right) - this.sum(left - 1);
  }
}
