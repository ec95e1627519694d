import { BaseRandomSource } from "./base";

/** Replays queued floats, then keeps returning `fallback`. */
export class ScriptedRandomSource extends BaseRandomSource {
  private readonly queue: number[];

  constructor(floats: number[] = [], private readonly fallback = 0) {
    super();
    this.queue = [...floats];
  }

  nextFloat(): number {
    return this.queue.shift() ?? this.fallback;
  }
}

/** Float that makes nextInt/pick land on `index` out of `size` outcomes. */
export function indexFloat(index: number, size: number): number {
  return (index + 0.5) / size;
}
