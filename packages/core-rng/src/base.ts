export interface IRandomSource {
  /** Uniform draw in [0, 1). */
  nextFloat(): number;
  /** Uniform integer draw in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

export abstract class BaseRandomSource implements IRandomSource {
  abstract nextFloat(): number;

  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new Error("Invalid nextInt bounds");
    }
    const span = max - min + 1;
    return min + Math.floor(this.nextFloat() * span);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error("Cannot pick from an empty list");
    }
    return items[this.nextInt(0, items.length - 1)];
  }
}
