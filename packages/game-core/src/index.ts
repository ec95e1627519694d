import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { FORTUNE_SETTINGS, type FortuneSettings, loadFortuneSettings } from "@fortune/core-config";
import { FileGameDataSource, GAME_DATA_SOURCE } from "@fortune/core-data";
import { LOGGER, PinoLogger } from "@fortune/core-logging";
import { HmacRandomSource, RNG_SERVICE, seedFromString } from "@fortune/core-rng";

export interface GameCoreModuleOptions {
  /** Data files used when FORTUNE_WHEEL_PATH / FORTUNE_PHRASES_PATH are unset. */
  defaultWheelPath: string;
  defaultPhrasesPath: string;
  defaultLogLevel?: string;
  defaultSpinDelayMs?: number;
  /** Skip reading a .env file; tests pass their settings through process.env. */
  ignoreEnvFile?: boolean;
}

@Module({})
export class GameCoreModule {
  static register(options: GameCoreModuleOptions): DynamicModule {
    return {
      module: GameCoreModule,
      imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: options.ignoreEnvFile ?? false })],
      providers: [
        {
          provide: FORTUNE_SETTINGS,
          inject: [ConfigService],
          useFactory: (config: ConfigService): FortuneSettings =>
            loadFortuneSettings((key) => config.get<string>(key), {
              wheelPath: options.defaultWheelPath,
              phrasesPath: options.defaultPhrasesPath,
              logLevel: options.defaultLogLevel,
              spinDelayMs: options.defaultSpinDelayMs,
            }),
        },
        {
          provide: LOGGER,
          inject: [FORTUNE_SETTINGS],
          useFactory: (settings: FortuneSettings) => new PinoLogger({ level: settings.logLevel }),
        },
        {
          provide: RNG_SERVICE,
          inject: [FORTUNE_SETTINGS],
          useFactory: (settings: FortuneSettings) =>
            new HmacRandomSource(settings.seed ? seedFromString(settings.seed) : undefined),
        },
        {
          provide: GAME_DATA_SOURCE,
          inject: [FORTUNE_SETTINGS],
          useFactory: (settings: FortuneSettings) =>
            new FileGameDataSource({ wheelPath: settings.wheelPath, phrasesPath: settings.phrasesPath }),
        },
      ],
      exports: [FORTUNE_SETTINGS, LOGGER, RNG_SERVICE, GAME_DATA_SOURCE],
    };
  }
}
