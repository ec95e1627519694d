import { InvalidPhraseDataError } from "@fortune/core-errors";
import { isLetter, type PhraseCatalog } from "@fortune/core-types";

/** A puzzle needs at least one A-Z letter, otherwise it starts out solved. */
export function hasLetter(phrase: string): boolean {
  return [...phrase.toUpperCase()].some(isLetter);
}

export function assertValidPhrase(phrase: string, details: Record<string, unknown> = {}): void {
  if (phrase.trim().length === 0) {
    throw new InvalidPhraseDataError("Phrases: a phrase must be a non-empty string", details);
  }
  if (!hasLetter(phrase)) {
    throw new InvalidPhraseDataError(`Phrases: '${phrase}' has no letters to guess`, { ...details, phrase });
  }
}

export function assertValidCatalog(catalog: PhraseCatalog): void {
  const categories = Object.keys(catalog);
  if (categories.length === 0) {
    throw new InvalidPhraseDataError("Phrases: catalog must contain at least one category");
  }
  for (const category of categories) {
    const phrases = catalog[category];
    if (!Array.isArray(phrases) || phrases.length === 0) {
      throw new InvalidPhraseDataError(`Phrases: category '${category}' must contain at least one phrase`, { category });
    }
    phrases.forEach((phrase, index) => {
      if (typeof phrase !== "string" || phrase.trim().length === 0) {
        throw new InvalidPhraseDataError(`Phrases: entry ${index} in '${category}' must be a non-empty string`, { category, index });
      }
      if (!hasLetter(phrase)) {
        throw new InvalidPhraseDataError(`Phrases: entry ${index} in '${category}' has no letters to guess`, { category, index, phrase });
      }
    });
  }
}
