import seedrandom from "seedrandom";

export type RandomState = seedrandom.State;

/** Seeded PRNG whose state can be captured and restored for replays. */
export class SeededRandom {
  private prng: seedrandom.PRNG;

  constructor(seed: string | number = 0, state?: RandomState) {
    this.prng = state
      ? seedrandom("", { state })
      : seedrandom(String(seed), { state: true });
  }

  next(): number {
    return this.prng();
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError("choice() from an empty list");
    return items[this.int(0, items.length - 1)];
  }

  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }

  save(): RandomState {
    return this.prng.state();
  }

  restore(state: RandomState): void {
    this.prng = seedrandom("", { state });
  }
}
