import { LETTERS } from "@fortune/core-types";
import type { IRandomSource } from "@fortune/core-rng";
import { isLetterAllowed } from "./moves";
import type { Action } from "./types";

/** English letters from least to most frequent. */
export const LETTER_FREQUENCY_RANKING = "ZQXJKVBPYGFWMUCLDRHSNIOATE";

export function eligibleLetters(guessedLetters: ReadonlySet<string>, money: number): string[] {
  return [...LETTERS].filter((letter) => isLetterAllowed(letter, guessedLetters, money));
}

/** Smart iff a 1..10 draw beats the difficulty, so difficulty 1 plays smart 90% of the time. */
export function smartCoinFlip(difficulty: number, rng: IRandomSource): boolean {
  return rng.nextInt(1, 10) > difficulty;
}

export function mostFrequentLetter(letters: readonly string[]): string {
  return [...letters].sort((a, b) => LETTER_FREQUENCY_RANKING.indexOf(a) - LETTER_FREQUENCY_RANKING.indexOf(b))[letters.length - 1];
}

// Blind to the phrase: only what is allowed and how common it is.
export function decideComputerMove(
  guessedLetters: ReadonlySet<string>,
  money: number,
  difficulty: number,
  rng: IRandomSource,
): Action {
  const eligible = eligibleLetters(guessedLetters, money);
  if (eligible.length === 0) {
    return { type: "PASS" };
  }
  const letter = smartCoinFlip(difficulty, rng) ? mostFrequentLetter(eligible) : rng.pick(eligible);
  return { type: "GUESS_LETTER", letter };
}
