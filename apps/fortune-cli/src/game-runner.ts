import type { FortuneSettings } from "@fortune/core-config";
import type { IGameDataSource } from "@fortune/core-data";
import { isSetupError, toFortuneError } from "@fortune/core-errors";
import type { ILogger } from "@fortune/core-logging";
import type { IRandomSource } from "@fortune/core-rng";
import { createGame, type GameOutcome } from "@fortune/game-math-fortune";
import type { ConsoleIO } from "./console-io";
import { ConsoleGameListener } from "./console-listener";
import { ConsoleMovePrompt } from "./console-move-prompt";
import { buildPlayers, collectPlayerSetup } from "./setup";

export interface GameRunnerDeps {
  io: ConsoleIO;
  dataSource: IGameDataSource;
  rng: IRandomSource;
  logger: ILogger;
  settings: Pick<FortuneSettings, "spinDelayMs">;
}

const TITLE = "WHEEL OF FORTUNE";

export function printBanner(io: ConsoleIO): void {
  const rule = "=".repeat(TITLE.length);
  io.print(rule);
  io.print(TITLE);
  io.print(rule);
  io.print("");
}

export function describeOutcome(outcome: GameOutcome): string {
  if (outcome.winner) {
    return `${outcome.winner.name} wins! The phrase was: ${outcome.phrase}`;
  }
  switch (outcome.status) {
    case "STALEMATE":
      return `Nobody can guess another letter. The phrase was: ${outcome.phrase}`;
    case "TURN_LIMIT":
      return `Out of turns. The phrase was: ${outcome.phrase}`;
    default:
      return "Goodbye!";
  }
}

/** Plays one interactive game and returns the process exit code. */
export async function runGame(deps: GameRunnerDeps): Promise<number> {
  const { io, dataSource, rng, logger } = deps;
  try {
    printBanner(io);
    const setup = await collectPlayerSetup(io);
    const players = buildPlayers(setup, new ConsoleMovePrompt(io));

    const catalog = await dataSource.loadPhrases();
    const wheel = await dataSource.loadWheel();

    const engine = createGame({
      catalog,
      wheel,
      players,
      rng,
      logger,
      listener: new ConsoleGameListener(io, deps.settings.spinDelayMs),
    });
    const outcome = await engine.run();
    io.print(describeOutcome(outcome));
    return 0;
  } catch (err) {
    const error = toFortuneError(err);
    if (isSetupError(error)) {
      logger.info("game.setup_failed", { code: error.code, details: error.details });
    } else {
      logger.error("game.unexpected_error", { code: error.code, err: error.message });
    }
    io.print(`Error: ${error.message}`);
    return 1;
  }
}
