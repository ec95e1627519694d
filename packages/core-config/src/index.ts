import { plainToInstance } from "class-transformer";
import { IsArray, IsInt, IsOptional, IsString, Max, Min, ValidateIf, validateSync } from "class-validator";
import { ConfigurationError } from "@fortune/core-errors";
import { MAX_DIFFICULTY, MAX_PLAYERS_PER_KIND, MIN_DIFFICULTY, MIN_PLAYERS_PER_KIND } from "@fortune/core-types";

export interface FortuneSettings {
  wheelPath: string;
  phrasesPath: string;
  seed?: string;
  spinDelayMs: number;
  logLevel: string;
}

export const FORTUNE_SETTINGS = Symbol("FORTUNE_SETTINGS");

export interface SettingsDefaults {
  wheelPath: string;
  phrasesPath: string;
  logLevel?: string;
  /** Pause after each spin when FORTUNE_SPIN_DELAY_MS is unset. */
  spinDelayMs?: number;
}

/** Reads FORTUNE_* variables through any `get`-style lookup (process.env, Nest ConfigService). */
export function loadFortuneSettings(get: (key: string) => string | undefined, defaults: SettingsDefaults): FortuneSettings {
  const rawDelay = get("FORTUNE_SPIN_DELAY_MS");
  const spinDelayMs = rawDelay == null || rawDelay === "" ? defaults.spinDelayMs ?? 0 : Number(rawDelay);
  if (!Number.isInteger(spinDelayMs) || spinDelayMs < 0) {
    throw new ConfigurationError("FORTUNE_SPIN_DELAY_MS must be a non-negative integer", { value: rawDelay });
  }
  const seed = get("FORTUNE_SEED");
  return {
    wheelPath: get("FORTUNE_WHEEL_PATH") || defaults.wheelPath,
    phrasesPath: get("FORTUNE_PHRASES_PATH") || defaults.phrasesPath,
    seed: seed ? seed : undefined,
    spinDelayMs,
    logLevel: get("LOG_LEVEL") || defaults.logLevel || "info",
  };
}

export class PlayerSetupDto {
  @IsInt()
  @Min(MIN_PLAYERS_PER_KIND)
  @Max(MAX_PLAYERS_PER_KIND)
  humanCount!: number;

  @IsArray()
  @IsString({ each: true })
  humanNames!: string[];

  @IsInt()
  @Min(MIN_PLAYERS_PER_KIND)
  @Max(MAX_PLAYERS_PER_KIND)
  computerCount!: number;

  @ValidateIf((setup: PlayerSetupDto) => setup.computerCount > 0)
  @IsInt()
  @Min(MIN_DIFFICULTY)
  @Max(MAX_DIFFICULTY)
  @IsOptional()
  difficulty?: number;
}

export interface PlayerSetup {
  humanNames: string[];
  computerCount: number;
  difficulty?: number;
}

export function validatePlayerSetup(input: Record<string, unknown>): PlayerSetup {
  const dto = plainToInstance(PlayerSetupDto, input);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new ConfigurationError(`Invalid player setup: ${problems.join("; ")}`, { problems });
  }
  if (dto.humanNames.length !== dto.humanCount) {
    throw new ConfigurationError("Invalid player setup: one name is required per human player", {
      humanCount: dto.humanCount,
      names: dto.humanNames.length,
    });
  }
  if (dto.computerCount > 0 && dto.difficulty == null) {
    throw new ConfigurationError("Invalid player setup: difficulty is required when computer players take part");
  }
  if (dto.humanCount + dto.computerCount === 0) {
    throw new ConfigurationError("We need players!");
  }
  return {
    humanNames: dto.humanNames,
    computerCount: dto.computerCount,
    difficulty: dto.computerCount > 0 ? dto.difficulty : undefined,
  };
}
