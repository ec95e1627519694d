import type { GameStatus, PhraseCatalog, Wheel, WheelSegment } from "@fortune/core-types";

export type { PhraseCatalog, Wheel, WheelSegment };

export interface CategoryAndPhrase {
  category: string;
  phrase: string;
}

export type Action =
  | { type: "EXIT" }
  | { type: "PASS" }
  | { type: "GUESS_LETTER"; letter: string }
  | { type: "GUESS_PHRASE"; text: string };

export interface MoveContext {
  category: string;
  obscuredPhrase: string;
  guessedLetters: ReadonlySet<string>;
  playerName: string;
  playerMoney: number;
}

export interface MovePrompt {
  requestMove(context: MoveContext): Promise<string>;
  /** Called when the last move was rejected, before the player is asked again. */
  rejectMove?(context: MoveContext, move: string, reason: string): void | Promise<void>;
}

interface PlayerBase {
  readonly name: string;
  money: number;
  readonly wonPrizes: Set<string>;
}

export interface HumanPlayer extends PlayerBase {
  readonly kind: "human";
  readonly prompt: MovePrompt;
}

export interface ComputerPlayer extends PlayerBase {
  readonly kind: "computer";
  readonly difficulty: number;
}

export type Player = HumanPlayer | ComputerPlayer;

/** Read-only view of a game handed to callers and listeners. */
export interface GameState {
  readonly category: string;
  readonly phrase: string;
  readonly guessedLetters: ReadonlySet<string>;
  readonly players: readonly Player[];
  readonly currentPlayerIndex: number;
  readonly winner?: Player;
  readonly status: GameStatus;
  readonly turn: number;
}

export type TurnEvent =
  | { type: "BANKRUPT"; moneyLost: number }
  | { type: "LOSE_TURN" }
  | { type: "EXIT" }
  | { type: "PASS" }
  | { type: "GUESS_LETTER"; letter: string; occurrences: number; award: number; prize?: string; solved: boolean }
  | { type: "GUESS_PHRASE"; text: string; correct: boolean };

export interface TurnReport {
  turn: number;
  player: Player;
  segment: WheelSegment;
  event: TurnEvent;
  rejectedMoves: number;
  status: GameStatus;
}

export interface GameOutcome {
  category: string;
  phrase: string;
  winner?: Player;
  status: GameStatus;
  turns: number;
}

export interface GameListener {
  onSpin?(player: Player, segment: WheelSegment, state: GameState): void | Promise<void>;
  onTurnEnd?(report: TurnReport, state: GameState): void | Promise<void>;
}
