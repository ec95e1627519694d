import { describe, expect, it } from "vitest";
import { HmacRandomSource, seedFromString } from "@fortune/core-rng";
import { LETTERS, VOWELS } from "@fortune/core-types";
import { decideComputerMove, eligibleLetters, mostFrequentLetter } from "../src";
import { ScriptedRandom } from "./test-support";

const CONSONANTS = [...LETTERS].filter((letter) => !VOWELS.includes(letter));
const SMART_DRAW = 0.95; // nextInt(1, 10) === 10
const DULL_DRAW = 0.05; // nextInt(1, 10) === 1

describe("eligibleLetters", () => {
  it("offers only consonants without enough money for a vowel", () => {
    expect(eligibleLetters(new Set(), 0)).toEqual(CONSONANTS);
    expect(eligibleLetters(new Set(), 250)).toHaveLength(26);
  });

  it("skips letters that were already guessed", () => {
    expect(eligibleLetters(new Set(["B", "C", "D"]), 0)[0]).toBe("F");
  });
});

describe("mostFrequentLetter", () => {
  it("ranks by English letter frequency", () => {
    expect(mostFrequentLetter(["Z", "S", "Q"])).toBe("S");
    expect(mostFrequentLetter(["A", "T", "E"])).toBe("E");
  });
});

describe("decideComputerMove", () => {
  it("passes when nothing is eligible", () => {
    const action = decideComputerMove(new Set(CONSONANTS), 0, 1, new ScriptedRandom());
    expect(action).toEqual({ type: "PASS" });
  });

  it("plays the most frequent eligible letter on a smart draw", () => {
    expect(decideComputerMove(new Set(), 0, 1, new ScriptedRandom([SMART_DRAW]))).toEqual({ type: "GUESS_LETTER", letter: "T" });
    expect(decideComputerMove(new Set(), 250, 1, new ScriptedRandom([SMART_DRAW]))).toEqual({ type: "GUESS_LETTER", letter: "E" });
    expect(decideComputerMove(new Set(["T", "N"]), 0, 1, new ScriptedRandom([SMART_DRAW]))).toEqual({ type: "GUESS_LETTER", letter: "S" });
  });

  it("picks uniformly among eligible letters otherwise", () => {
    const action = decideComputerMove(new Set(), 0, 5, new ScriptedRandom([DULL_DRAW, 0]));
    expect(action).toEqual({ type: "GUESS_LETTER", letter: "B" });
  });

  it("never plays smart at difficulty 10", () => {
    const action = decideComputerMove(new Set(), 0, 10, new ScriptedRandom([SMART_DRAW, 0]));
    expect(action).toEqual({ type: "GUESS_LETTER", letter: "B" });
  });

  it("never proposes a guessed letter or an unaffordable vowel", () => {
    const guessed = new Set(["T", "N", "S", "R"]);
    const rng = new HmacRandomSource(seedFromString("policy-eligibility"));
    for (let i = 0; i < 500; i++) {
      const action = decideComputerMove(guessed, 249, 1 + (i % 10), rng);
      if (action.type !== "GUESS_LETTER") {
        throw new Error(`unexpected action ${action.type}`);
      }
      expect(guessed.has(action.letter)).toBe(false);
      expect(VOWELS.includes(action.letter)).toBe(false);
    }
  });

  it("plays smart more often as difficulty decreases", () => {
    const trials = 2_000;
    const smartRate: number[] = [];
    for (let difficulty = 1; difficulty <= 10; difficulty++) {
      const rng = new HmacRandomSource(seedFromString(`policy-difficulty-${difficulty}`));
      let smart = 0;
      for (let i = 0; i < trials; i++) {
        const action = decideComputerMove(new Set(), 0, difficulty, rng);
        if (action.type === "GUESS_LETTER" && action.letter === "T") smart += 1;
      }
      smartRate.push(smart / trials);
    }

    for (let i = 0; i < smartRate.length - 1; i++) {
      expect(smartRate[i]).toBeGreaterThan(smartRate[i + 1]);
    }
    expect(smartRate[0]).toBeGreaterThan(0.85);
    expect(smartRate[9]).toBeLessThan(0.1);
  });
});
