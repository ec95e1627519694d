import type { IGameDataSource } from "@fortune/core-data";
import type { ILogger } from "@fortune/core-logging";
import { HmacRandomSource, seedFromString } from "@fortune/core-rng";
import { MAX_PLAYERS_PER_KIND } from "@fortune/core-types";
import { createComputerPlayer, createGame, type Player } from "@fortune/game-math-fortune";

export interface SimulationOptions {
  games: number;
  computers: number;
  difficulty: number;
  seed?: string;
  maxTurns: number;
}

export interface SimulationSummary {
  games: number;
  computers: number;
  difficulty: number;
  wins: Record<string, number>;
  unfinished: number;
  averageTurns: number;
  averageWinningMoney: number;
}

export function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.replace(/^--/, "");
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

export function toSimulationOptions(args: Record<string, string>): SimulationOptions {
  const options: SimulationOptions = {
    games: Number(args.games ?? 100),
    computers: Number(args.computers ?? 3),
    difficulty: Number(args.difficulty ?? 5),
    seed: args.seed,
    maxTurns: Number(args["max-turns"] ?? 1000),
  };
  if (!Number.isInteger(options.games) || options.games <= 0) {
    throw new Error("Simulator: --games must be a positive integer");
  }
  if (!Number.isInteger(options.computers) || options.computers < 1 || options.computers > MAX_PLAYERS_PER_KIND) {
    throw new Error(`Simulator: --computers must be between 1 and ${MAX_PLAYERS_PER_KIND}`);
  }
  return options;
}

export async function runSimulation(options: SimulationOptions, dataSource: IGameDataSource, logger: ILogger): Promise<SimulationSummary> {
  const catalog = await dataSource.loadPhrases();
  const wheel = await dataSource.loadWheel();

  const wins: Record<string, number> = {};
  let unfinished = 0;
  let totalTurns = 0;
  let winningMoney = 0;

  for (let i = 0; i < options.games; i++) {
    const players: Player[] = [];
    for (let p = 0; p < options.computers; p++) {
      players.push(createComputerPlayer(`Computer ${p + 1}`, options.difficulty));
    }
    const rng = new HmacRandomSource(options.seed ? seedFromString(`${options.seed}:${i}`) : undefined);
    const engine = createGame({ catalog, wheel, players, rng, logger, maxTurns: options.maxTurns });
    const outcome = await engine.run();

    totalTurns += outcome.turns;
    if (outcome.winner) {
      wins[outcome.winner.name] = (wins[outcome.winner.name] ?? 0) + 1;
      winningMoney += outcome.winner.money;
    } else {
      unfinished += 1;
    }
  }

  const finished = options.games - unfinished;
  return {
    games: options.games,
    computers: options.computers,
    difficulty: options.difficulty,
    wins,
    unfinished,
    averageTurns: totalTurns / options.games,
    averageWinningMoney: finished === 0 ? 0 : winningMoney / finished,
  };
}
