import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { FORTUNE_SETTINGS, type FortuneSettings } from "@fortune/core-config";
import { GAME_DATA_SOURCE, type IGameDataSource } from "@fortune/core-data";
import { toFortuneError } from "@fortune/core-errors";
import { LOGGER, type ILogger } from "@fortune/core-logging";
import { RNG_SERVICE, type IRandomSource } from "@fortune/core-rng";
import { AppModule } from "./app.module";
import { ReadlineConsoleIO } from "./console-io";
import { runGame } from "./game-runner";
import { parseArgs, runSimulation, toSimulationOptions } from "./simulator";

export async function bootstrap(argv: string[] = process.argv): Promise<number> {
  const [, , command, ...rest] = argv;
  try {
    const app = await NestFactory.createApplicationContext(AppModule, { logger: false });
    const settings = app.get<FortuneSettings>(FORTUNE_SETTINGS);
    const dataSource = app.get<IGameDataSource>(GAME_DATA_SOURCE);
    const logger = app.get<ILogger>(LOGGER);

    try {
      if (command === "simulate") {
        const summary = await runSimulation(toSimulationOptions(parseArgs(rest)), dataSource, logger);
        console.log(JSON.stringify(summary, null, 2));
        return 0;
      }
      if (command && command !== "play") {
        console.error(`Unknown command: ${command}`);
        console.error("Usage: fortune [play] | fortune simulate --games 100 --computers 3 --difficulty 5 [--seed abc] [--max-turns 1000]");
        return 1;
      }

      const io = new ReadlineConsoleIO();
      try {
        return await runGame({ io, dataSource, rng: app.get<IRandomSource>(RNG_SERVICE), logger, settings });
      } finally {
        io.close();
      }
    } finally {
      await app.close();
    }
  } catch (err) {
    console.error(`Error: ${toFortuneError(err).message}`);
    return 1;
  }
}

void bootstrap().then((code) => {
  process.exitCode = code;
});
