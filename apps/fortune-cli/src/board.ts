import type { MoveContext } from "@fortune/game-math-fortune";

export function formatGuessed(guessedLetters: ReadonlySet<string>): string {
  return [...guessedLetters].sort().join(", ");
}

export function renderBoard(category: string, obscuredPhrase: string, guessedLetters: ReadonlySet<string>): string {
  return [
    "",
    `Category: ${category}`,
    `Phrase:   ${obscuredPhrase}`,
    `Guessed letters: ${formatGuessed(guessedLetters)}`,
  ].join("\n");
}

export function renderMoveContext(context: MoveContext): string {
  return `\n${context.playerName}, you have ${context.playerMoney}` + renderBoard(context.category, context.obscuredPhrase, context.guessedLetters);
}
