import { join } from "path";
import { Module } from "@nestjs/common";
import { GameCoreModule } from "@fortune/game-core";

export const DATA_DIR = join(__dirname, "..", "data");

@Module({
  imports: [
    GameCoreModule.register({
      defaultWheelPath: join(DATA_DIR, "wheel.json"),
      defaultPhrasesPath: join(DATA_DIR, "phrases.json"),
      // Keep the board readable; raise LOG_LEVEL to see engine events.
      defaultLogLevel: "warn",
      defaultSpinDelayMs: 2000,
    }),
  ],
})
export class AppModule {}
