// xorshift32 never leaves the all-zero state, so a zero seed is remapped.
const ZERO_SEED_REPLACEMENT = 0x9e3779b9;

export class Xorshift32 {
  #state: number;

  constructor(seed: number) {
    const s = seed >>> 0;
    this.#state = s === 0 ? ZERO_SEED_REPLACEMENT : s;
  }

  get state(): number {
    return this.#state;
  }

  nextUint32(): number {
    let x = this.#state;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.#state = x >>> 0;
    return this.#state;
  }

  /** Integer in [0, bound). */
  nextBelow(bound: number): number {
    return this.nextUint32() % bound;
  }

  /** Fisher-Yates over a copy of `items`. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i -= 1) {
      const j = this.nextBelow(i + 1);
      const a = out[i];
      const b = out[j];
      if (a === undefined || b === undefined) continue;
      out[i] = b;
      out[j] = a;
    }
    return out;
  }
}
