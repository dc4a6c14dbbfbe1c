/**
 * Random choices for seeded playouts. The seed string is folded into a
 * 32-bit state with FNV-1a and stepped with xorshift32, so a seed always
 * reaches the same positions.
 */
export class PlayoutRng {
  private state: number;

  constructor(seed: string) {
    let hash = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      hash = Math.imul(hash ^ seed.charCodeAt(i), 0x01000193) >>> 0;
    }
    // xorshift never leaves zero
    this.state = hash === 0 ? 0x9e3779b9 : hash;
  }

  /** An integer in [0, bound) */
  below(bound: number): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return Math.floor((this.state / 0x100000000) * bound);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("Cannot pick from an empty list");
    return items[this.below(items.length)];
  }

  /** How many plies a playout runs, from 1 to maxPlies */
  playoutLength(maxPlies: number): number {
    return 1 + this.below(maxPlies);
  }
}
