import { assertValidWheel } from "@fortune/core-data";
import type { IRandomSource } from "@fortune/core-rng";
import type { Wheel, WheelSegment } from "./types";

/**
 * Uniform pick over the whole wheel. Repeated segments are intentional: they
 * stand for a larger share of the wheel face.
 */
export function spin(wheel: Wheel, rng: IRandomSource): WheelSegment {
  assertValidWheel(wheel);
  return rng.pick(wheel);
}
