import { type PlayerSetup, validatePlayerSetup } from "@fortune/core-config";
import { MAX_DIFFICULTY, MAX_PLAYERS_PER_KIND, MIN_DIFFICULTY, MIN_PLAYERS_PER_KIND } from "@fortune/core-types";
import { createComputerPlayer, createHumanPlayer, type MovePrompt, type Player } from "@fortune/game-math-fortune";
import type { ConsoleIO } from "./console-io";

export async function getNumberBetween(io: ConsoleIO, question: string, min: number, max: number): Promise<number> {
  for (;;) {
    const raw = (await io.ask(question)).trim();
    if (!/^-?\d+$/.test(raw)) {
      io.print("Invalid input! It must be a number.");
      continue;
    }
    const value = Number(raw);
    if (value >= min && value <= max) {
      return value;
    }
    io.print(`It must be between ${min} and ${max}`);
  }
}

export async function collectPlayerSetup(io: ConsoleIO): Promise<PlayerSetup> {
  const humanCount = await getNumberBetween(io, "How many human players?\n", MIN_PLAYERS_PER_KIND, MAX_PLAYERS_PER_KIND);
  const humanNames: string[] = [];
  for (let i = 0; i < humanCount; i++) {
    const name = (await io.ask(`Name of player #${i + 1}: `)).trim();
    humanNames.push(name || `Player ${i + 1}`);
  }
  const computerCount = await getNumberBetween(io, "How many computer players?\n", MIN_PLAYERS_PER_KIND, MAX_PLAYERS_PER_KIND);
  const difficulty =
    computerCount >= 1
      ? await getNumberBetween(io, `Which difficulty (${MIN_DIFFICULTY}-${MAX_DIFFICULTY}, 1 = hardest)?\n`, MIN_DIFFICULTY, MAX_DIFFICULTY)
      : undefined;

  return validatePlayerSetup({ humanCount, humanNames, computerCount, difficulty });
}

export function buildPlayers(setup: PlayerSetup, prompt: MovePrompt): Player[] {
  const humans = setup.humanNames.map((name) => createHumanPlayer(name, prompt));
  const computers: Player[] = [];
  for (let i = 0; i < setup.computerCount; i++) {
    computers.push(createComputerPlayer(`Computer ${i + 1}`, setup.difficulty ?? MAX_DIFFICULTY));
  }
  return [...humans, ...computers];
}
