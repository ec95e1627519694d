import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  DataLoadError,
  FortuneErrorCode,
  InvalidMoveError,
  UnexpectedError,
  fortuneErrorPayload,
  isSetupError,
  toFortuneError,
} from "../src";

describe("fortune errors", () => {
  it("carries a code and details", () => {
    const err = new DataLoadError("RESOURCE_MISSING", "wheel.json", 'File "wheel.json" was not found');
    expect(err.code).toBe(FortuneErrorCode.DATA_LOAD_FAILED);
    expect(err.details).toEqual({ reason: "RESOURCE_MISSING", resource: "wheel.json" });
    expect(err.name).toBe("DataLoadError");
  });

  it("wraps foreign errors as unexpected", () => {
    const wrapped = toFortuneError(new Error("boom"));
    expect(wrapped).toBeInstanceOf(UnexpectedError);
    expect(wrapped.message).toBe("Unexpected error: boom");
    expect(toFortuneError("plain")).toMatchObject({ code: FortuneErrorCode.UNEXPECTED, message: "Unexpected error: plain" });
  });

  it("passes fortune errors through untouched", () => {
    const err = new ConfigurationError("We need players!");
    expect(toFortuneError(err)).toBe(err);
  });

  it("separates setup failures from in-game ones", () => {
    expect(isSetupError(new ConfigurationError("x"))).toBe(true);
    expect(isSetupError(new InvalidMoveError("EMPTY_MOVE", "x", ""))).toBe(false);
    expect(isSetupError(new UnexpectedError("x"))).toBe(false);
  });

  it("builds payloads", () => {
    expect(fortuneErrorPayload(FortuneErrorCode.INVALID_MOVE, "nope")).toEqual({
      error: "INVALID_MOVE",
      message: "nope",
      details: undefined,
    });
  });
});
