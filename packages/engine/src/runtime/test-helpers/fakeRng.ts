import type { IRNG } from "../rng";

/**
 * FakeRng - Test helper that returns predefined rolls, in order
 * Implements the same interface as RNG for testing purposes
 */
export class FakeRng implements IRNG {
  private rolls: number[];
  private index: number = 0;

  constructor(rolls: number[]) {
    this.rolls = [...rolls];
  }

  /**
   * Returns the next predefined roll, which must lie in [min, max]
   * Throws if rolls are exhausted
   */
  nextInt(min: number, max: number): number {
    if (this.index >= this.rolls.length) {
      throw new Error(
        `FakeRng: No more rolls available. Requested roll ${this.index + 1}, but only ${this.rolls.length} rolls provided.`
      );
    }
    const roll = this.rolls[this.index];
    if (roll < min || roll > max) {
      throw new Error(`FakeRng: roll ${roll} out of range [${min}, ${max}]`);
    }
    this.index++;
    return roll;
  }

  rollPercentile(faces: number = 100): number {
    return this.nextInt(1, faces);
  }

  /**
   * Returns next random number (for compatibility with RNG interface)
   */
  next(): number {
    // Convert D100 roll to 0..1 range for compatibility
    return (this.rollPercentile() - 1) / 100;
  }

  getCounter(): number {
    return this.index;
  }

  /**
   * Returns seed (always 0 for FakeRng)
   */
  getSeed(): number {
    return 0;
  }

  /**
   * Rolls not consumed yet
   */
  get remaining(): number {
    return this.rolls.length - this.index;
  }
}
