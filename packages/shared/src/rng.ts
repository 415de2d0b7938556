export class XorShift32 {
  private _state: number;
  constructor(seed = 1) {
    this._state = seed >>> 0 || 1;
  }
  int(): number {
    // https://en.wikipedia.org/wiki/Xorshift
    let x = this._state;
    x ^= x << 13; x ^= x >>> 17; x ^= x << 5;
    this._state = x >>> 0;
    return this._state;
  }
  float(): number { return (this.int() >>> 0) / 0x100000000; }
  /** Uniform integer in [0, n). */
  below(n: number): number { return Math.floor(this.float() * n); }
}

/**
 * Draws `count` distinct integers from [0, total) with a partial Fisher-Yates
 * shuffle. Swaps are kept in a sparse map so large ranges cost O(count).
 */
export function sampleDistinct(rng: XorShift32, total: number, count: number): number[] {
  if (count > total) throw new RangeError(`cannot draw ${count} distinct values from ${total}`);
  const swapped = new Map<number, number>();
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + rng.below(total - i);
    const vj = swapped.get(j) ?? j;
    const vi = swapped.get(i) ?? i;
    swapped.set(j, vi);
    out.push(vj);
  }
  return out;
}
