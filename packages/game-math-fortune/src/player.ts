import { ConfigurationError } from "@fortune/core-errors";
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from "@fortune/core-types";
import type { IRandomSource } from "@fortune/core-rng";
import { formatAction } from "./moves";
import { decideComputerMove } from "./policy";
import type { ComputerPlayer, HumanPlayer, MoveContext, MovePrompt, Player } from "./types";

export function createHumanPlayer(name: string, prompt: MovePrompt): HumanPlayer {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ConfigurationError("Player name must not be empty");
  }
  return { kind: "human", name: trimmed, money: 0, wonPrizes: new Set(), prompt };
}

export function createComputerPlayer(name: string, difficulty: number): ComputerPlayer {
  if (!Number.isInteger(difficulty) || difficulty < MIN_DIFFICULTY || difficulty > MAX_DIFFICULTY) {
    throw new ConfigurationError(`Difficulty must be an integer between ${MIN_DIFFICULTY} and ${MAX_DIFFICULTY}`, { difficulty });
  }
  return { kind: "computer", name, money: 0, wonPrizes: new Set(), difficulty };
}

export function addMoney(player: Player, amount: number): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new Error("Player: amount must be a non-negative integer");
  }
  player.money += amount;
}

export function goBankrupt(player: Player): void {
  player.money = 0;
}

export function addPrize(player: Player, prize: string): void {
  player.wonPrizes.add(prize);
}

/** Raw move text; humans answer through their prompt, computers through the policy. */
export async function decideMove(player: Player, context: MoveContext, rng: IRandomSource): Promise<string> {
  switch (player.kind) {
    case "human":
      return (await player.prompt.requestMove(context)).toUpperCase();
    case "computer":
      return formatAction(decideComputerMove(context.guessedLetters, context.playerMoney, player.difficulty, rng));
  }
}
