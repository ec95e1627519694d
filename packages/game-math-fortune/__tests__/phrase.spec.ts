import { describe, expect, it } from "vitest";
import { InvalidPhraseDataError } from "@fortune/core-errors";
import { LETTERS } from "@fortune/core-types";
import { countOccurrences, isSolved, obscure, pickCategoryAndPhrase } from "../src";
import { ScriptedRandom } from "./test-support";

const ALPHABET = new Set(LETTERS);

describe("obscure", () => {
  it("hides every letter when nothing has been guessed", () => {
    expect(obscure("HELLO, WORLD!", new Set())).toBe("_____, _____!");
  });

  it("reveals the whole phrase once every letter is guessed", () => {
    expect(obscure("IT'S 5 O'CLOCK", ALPHABET)).toBe("IT'S 5 O'CLOCK");
  });

  it("keeps length and non-letters and reveals guessed letters everywhere", () => {
    const cases: [string, string[]][] = [
      ["A PENNY SAVED IS A PENNY EARNED", ["N", "E"]],
      ["ROCK & ROLL", ["R", "L", "Z"]],
      ["NO. 10 DOWNING STREET", []],
    ];
    for (const [phrase, letters] of cases) {
      const guessed = new Set(letters);
      const shown = obscure(phrase, guessed);
      expect(shown).toHaveLength(phrase.length);
      [...phrase].forEach((ch, idx) => {
        if (!LETTERS.includes(ch) || guessed.has(ch)) {
          expect(shown[idx]).toBe(ch);
        } else {
          expect(shown[idx]).toBe("_");
        }
      });
    }
  });

  it("treats guessed letters as a set", () => {
    const guessed = new Set(["L"]);
    guessed.add("L");
    expect(guessed.size).toBe(1);
    expect(obscure("HELLO", guessed)).toBe("__LL_");
  });
});

describe("isSolved / countOccurrences", () => {
  it("is solved only when every letter is revealed", () => {
    expect(isSolved("HI THERE", new Set(["H", "I", "T", "E"]))).toBe(false);
    expect(isSolved("HI THERE", new Set(["H", "I", "T", "E", "R"]))).toBe(true);
  });

  it("counts every occurrence of a letter", () => {
    expect(countOccurrences("HELLO WORLD", "L")).toBe(3);
    expect(countOccurrences("HELLO WORLD", "Z")).toBe(0);
  });
});

describe("pickCategoryAndPhrase", () => {
  const catalog = { Animals: ["cat", "dog"], Food: ["apple pie"] };

  it("picks a category, then a phrase, and uppercases it", () => {
    expect(pickCategoryAndPhrase(catalog, new ScriptedRandom([0.75, 0]))).toEqual({ category: "Food", phrase: "APPLE PIE" });
    expect(pickCategoryAndPhrase(catalog, new ScriptedRandom([0.1, 0.6]))).toEqual({ category: "Animals", phrase: "DOG" });
  });

  it("trims padding around catalog entries", () => {
    expect(pickCategoryAndPhrase({ Greeting: ["  Hello world "] }, new ScriptedRandom())).toEqual({ category: "Greeting", phrase: "HELLO WORLD" });
  });

  it("rejects phrases without letters", () => {
    expect(() => pickCategoryAndPhrase({ Year: ["2024"] }, new ScriptedRandom())).toThrow(InvalidPhraseDataError);
  });

  it("rejects an empty catalog", () => {
    expect(() => pickCategoryAndPhrase({}, new ScriptedRandom())).toThrow(InvalidPhraseDataError);
  });

  it("rejects a category without phrases", () => {
    expect(() => pickCategoryAndPhrase({ Animals: ["cat"], Empty: [] }, new ScriptedRandom())).toThrowError(/'Empty'/);
  });

  it("rejects blank phrases", () => {
    expect(() => pickCategoryAndPhrase({ Animals: ["   "] }, new ScriptedRandom())).toThrow(InvalidPhraseDataError);
  });
});
