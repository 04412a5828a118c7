import alea from 'alea';

/**
 * Six-sided dice plus the uniform draws the tables need.
 *
 * Seeded through alea so a world can be regenerated exactly. `mocks` replaces
 * the d6 stream with a fixed cycle, which is how the tests pin down a roll.
 */
export class Dice {
  private readonly random: () => number;
  private readonly mocks: readonly number[];
  private cursor = 0;

  constructor(seed: string | number = Date.now(), mocks: readonly number[] = []) {
    this.random = alea(seed);
    this.mocks = mocks;
  }

  d6(): number {
    if (this.mocks.length > 0) {
      const value = this.mocks[this.cursor % this.mocks.length];
      this.cursor++;
      return value;
    }
    return Math.floor(this.random() * 6) + 1;
  }

  // Sum of `count` d6
  roll(count = 3): number {
    let total = 0;
    for (let i = 0; i < count; i++) total += this.d6();
    return total;
  }

  uniform(lower: number, upper: number): number {
    return lower + (upper - lower) * this.random();
  }

  // Inclusive on both ends
  integer(lower: number, upper: number): number {
    return lower + Math.floor(this.random() * (upper - lower + 1));
  }
}
