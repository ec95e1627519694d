export type SegmentKind = "BANKRUPT" | "LOSE_TURN" | "CASH";

export type GameStatus = "IN_PROGRESS" | "SOLVED" | "EXITED" | "STALEMATE" | "TURN_LIMIT";

export const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

export const VOWELS = "AEIOU";

export const VOWEL_COST = 250;

export const MIN_PLAYERS_PER_KIND = 0;
export const MAX_PLAYERS_PER_KIND = 10;

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

export function isLetter(ch: string): boolean {
  return ch.length === 1 && LETTERS.includes(ch);
}

export function isVowel(ch: string): boolean {
  return ch.length === 1 && VOWELS.includes(ch);
}

export interface WheelSegment {
  readonly text: string;
  readonly kind: SegmentKind;
  readonly value: number;
  readonly prizeLabel: string;
}

export type Wheel = readonly WheelSegment[];

/** Raw wheel entry as stored in the data file. */
export interface WheelSegmentRecord {
  text: string;
  type: string;
  value?: number;
  prize?: string;
}

export type PhraseCatalog = Record<string, readonly string[]>;
