import { InvalidMoveError } from "@fortune/core-errors";
import { VOWEL_COST, isLetter, isVowel } from "@fortune/core-types";
import type { Action } from "./types";

export function canAffordVowel(money: number): boolean {
  return money >= VOWEL_COST;
}

export function isLetterAllowed(letter: string, guessedLetters: ReadonlySet<string>, money: number): boolean {
  return isLetter(letter) && !guessedLetters.has(letter) && (!isVowel(letter) || canAffordVowel(money));
}

/**
 * Turns raw player input into an action. Rejected input throws
 * InvalidMoveError; the caller re-prompts without consuming the turn.
 */
export function validateMove(raw: string, guessedLetters: ReadonlySet<string>, playerMoney: number): Action {
  const move = raw.trim().toUpperCase();

  if (move.length === 0) {
    throw new InvalidMoveError("EMPTY_MOVE", "Enter a letter, the whole phrase, PASS or EXIT", raw);
  }
  if (move === "EXIT") {
    return { type: "EXIT" };
  }
  if (move === "PASS") {
    return { type: "PASS" };
  }
  if (isLetter(move)) {
    if (guessedLetters.has(move)) {
      throw new InvalidMoveError("ALREADY_GUESSED", `Letter ${move} has already been guessed`, raw);
    }
    if (isVowel(move) && !canAffordVowel(playerMoney)) {
      throw new InvalidMoveError("VOWEL_UNAFFORDABLE", `A vowel needs at least ${VOWEL_COST}`, raw);
    }
    return { type: "GUESS_LETTER", letter: move };
  }
  return { type: "GUESS_PHRASE", text: move };
}

/** Inverse of validateMove for the actions a player can type. */
export function formatAction(action: Action): string {
  switch (action.type) {
    case "EXIT":
      return "EXIT";
    case "PASS":
      return "PASS";
    case "GUESS_LETTER":
      return action.letter;
    case "GUESS_PHRASE":
      return action.text;
  }
}
