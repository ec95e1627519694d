import { createHmac, randomBytes } from "crypto";
import { BaseRandomSource } from "./base";

export { BaseRandomSource, type IRandomSource } from "./base";
export * from "./test-utils";

export interface RandomSeed {
  serverSeed: string;
  clientSeed: string;
}

export const RNG_SERVICE = Symbol("RNG_SERVICE");

export function generateSeed(): RandomSeed {
  return {
    serverSeed: randomBytes(32).toString("hex"),
    clientSeed: randomBytes(16).toString("hex"),
  };
}

/** Derives a seed pair from a single user-supplied string so a game can be replayed. */
export function seedFromString(value: string): RandomSeed {
  return { serverSeed: value, clientSeed: "fortune" };
}

export function rollFloat(seed: RandomSeed, nonce: number): number {
  const payload = `${seed.clientSeed}:${nonce}`;
  const digest = createHmac("sha256", seed.serverSeed).update(payload).digest("hex");
  const slice = digest.slice(0, 13);
  const decimal = parseInt(slice, 16);
  const max = Math.pow(16, slice.length);
  return decimal / max;
}

export class HmacRandomSource extends BaseRandomSource {
  private nonce = 0;

  constructor(private readonly seed: RandomSeed = generateSeed()) {
    super();
  }

  get draws(): number {
    return this.nonce;
  }

  nextFloat(): number {
    const value = rollFloat(this.seed, this.nonce);
    this.nonce += 1;
    return value;
  }
}
