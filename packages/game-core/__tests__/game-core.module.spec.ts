import { Test } from "@nestjs/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FORTUNE_SETTINGS, type FortuneSettings } from "@fortune/core-config";
import { FileGameDataSource, GAME_DATA_SOURCE } from "@fortune/core-data";
import { LOGGER, PinoLogger } from "@fortune/core-logging";
import { HmacRandomSource, RNG_SERVICE } from "@fortune/core-rng";
import { GameCoreModule } from "../src";

const ENV_KEYS = ["FORTUNE_SEED", "FORTUNE_WHEEL_PATH", "FORTUNE_PHRASES_PATH", "FORTUNE_SPIN_DELAY_MS"];

async function compile(defaultSpinDelayMs?: number) {
  return Test.createTestingModule({
    imports: [
      GameCoreModule.register({
        defaultWheelPath: "/data/wheel.json",
        defaultPhrasesPath: "/data/phrases.json",
        defaultSpinDelayMs,
        ignoreEnvFile: true,
      }),
    ],
  }).compile();
}

describe("GameCoreModule", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it("wires settings, logger, randomness and data source", async () => {
    process.env.FORTUNE_SPIN_DELAY_MS = "250";
    const moduleRef = await compile();

    const settings = moduleRef.get<FortuneSettings>(FORTUNE_SETTINGS);
    expect(settings).toMatchObject({ wheelPath: "/data/wheel.json", phrasesPath: "/data/phrases.json", spinDelayMs: 250 });
    expect(moduleRef.get(LOGGER)).toBeInstanceOf(PinoLogger);
    expect(moduleRef.get(RNG_SERVICE)).toBeInstanceOf(HmacRandomSource);
    expect(moduleRef.get(GAME_DATA_SOURCE)).toBeInstanceOf(FileGameDataSource);
    await moduleRef.close();
  });

  it("applies the default spin delay when the environment has none", async () => {
    const moduleRef = await compile(2000);

    expect(moduleRef.get<FortuneSettings>(FORTUNE_SETTINGS).spinDelayMs).toBe(2000);
    await moduleRef.close();
  });

  it("seeds the random source from FORTUNE_SEED", async () => {
    process.env.FORTUNE_SEED = "test-seed";
    const first = await compile();
    const second = await compile();

    const a = first.get<HmacRandomSource>(RNG_SERVICE);
    const b = second.get<HmacRandomSource>(RNG_SERVICE);
    expect([a.nextFloat(), a.nextFloat()]).toEqual([b.nextFloat(), b.nextFloat()]);

    await first.close();
    await second.close();
  });
});
