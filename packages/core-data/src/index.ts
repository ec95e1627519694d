import { readFile } from "fs/promises";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { DataLoadError } from "@fortune/core-errors";
import type { PhraseCatalog, Wheel, WheelSegmentRecord } from "@fortune/core-types";
import { assertValidCatalog } from "./catalog";
import { WheelSegmentRecordDto } from "./dto";
import { parseWheel } from "./wheel";

export { WheelSegmentRecordDto } from "./dto";
export * from "./catalog";
export * from "./wheel";

export interface IGameDataSource {
  loadWheel(): Promise<Wheel>;
  loadPhrases(): Promise<PhraseCatalog>;
}

export const GAME_DATA_SOURCE = Symbol("GAME_DATA_SOURCE");

export interface FileGameDataSourceOptions {
  wheelPath: string;
  phrasesPath: string;
}

export class FileGameDataSource implements IGameDataSource {
  constructor(private readonly options: FileGameDataSourceOptions) {}

  async loadWheel(): Promise<Wheel> {
    const json = await readJsonResource(this.options.wheelPath);
    return parseWheel(toWheelRecords(json, this.options.wheelPath));
  }

  async loadPhrases(): Promise<PhraseCatalog> {
    const json = await readJsonResource(this.options.phrasesPath);
    const catalog = toPhraseCatalog(json, this.options.phrasesPath);
    assertValidCatalog(catalog);
    return catalog;
  }
}

export async function readJsonResource(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new DataLoadError("RESOURCE_MISSING", path, `File "${path}" was not found`);
    }
    throw err;
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataLoadError("MALFORMED", path, `File "${path}" contains invalid JSON: ${reason}`);
  }
}

export function toWheelRecords(json: unknown, resource = "wheel"): WheelSegmentRecord[] {
  if (!Array.isArray(json)) {
    throw new DataLoadError("MALFORMED", resource, `File "${resource}" must contain an array of wheel segments`);
  }
  return json.map((item: unknown, index) => {
    if (!isPlainObject(item)) {
      throw new DataLoadError("MALFORMED", resource, `Wheel segment ${index} in "${resource}" must be an object`);
    }
    const dto = plainToInstance(WheelSegmentRecordDto, item);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new DataLoadError("MALFORMED", resource, `Wheel segment ${index} in "${resource}" is invalid: ${problems.join("; ")}`);
    }
    return { text: dto.text, type: dto.type, value: dto.value, prize: dto.prize };
  });
}

export function toPhraseCatalog(json: unknown, resource = "phrases"): PhraseCatalog {
  if (!isPlainObject(json)) {
    throw new DataLoadError("MALFORMED", resource, `File "${resource}" must map categories to phrase lists`);
  }
  const catalog: Record<string, string[]> = {};
  for (const [category, phrases] of Object.entries(json)) {
    if (!Array.isArray(phrases) || !phrases.every((phrase): phrase is string => typeof phrase === "string")) {
      throw new DataLoadError("MALFORMED", resource, `Category "${category}" in "${resource}" must be a list of strings`);
    }
    catalog[category] = phrases;
  }
  return catalog;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
