import { assertValidCatalog } from "@fortune/core-data";
import { isLetter } from "@fortune/core-types";
import type { IRandomSource } from "@fortune/core-rng";
import type { CategoryAndPhrase, PhraseCatalog } from "./types";

export const PLACEHOLDER = "_";

export function pickCategoryAndPhrase(catalog: PhraseCatalog, rng: IRandomSource): CategoryAndPhrase {
  assertValidCatalog(catalog);
  const category = rng.pick(Object.keys(catalog));
  const phrase = rng.pick(catalog[category]).trim().toUpperCase();
  return { category, phrase };
}

export function obscure(phrase: string, guessedLetters: ReadonlySet<string>): string {
  let out = "";
  for (const ch of phrase) {
    out += isLetter(ch) && !guessedLetters.has(ch) ? PLACEHOLDER : ch;
  }
  return out;
}

export function isSolved(phrase: string, guessedLetters: ReadonlySet<string>): boolean {
  return obscure(phrase, guessedLetters) === phrase;
}

export function countOccurrences(phrase: string, letter: string): number {
  let count = 0;
  for (const ch of phrase) {
    if (ch === letter) count += 1;
  }
  return count;
}
