import { describe, expect, it } from "vitest";
import { InvalidPhraseDataError, InvalidWheelError } from "@fortune/core-errors";
import { assertValidCatalog, assertValidPhrase, parseWheel } from "../src";

describe("parseWheel", () => {
  it("maps data records to closed segment kinds with defaults", () => {
    const wheel = parseWheel([
      { text: "BANKRUPT", type: "bankrupt" },
      { text: "LOSE A TURN", type: "loseturn" },
      { text: "$500", type: "Cash", value: 500 },
      { text: "A Car!", type: "cash", prize: "Car" },
    ]);

    expect(wheel.map((segment) => segment.kind)).toEqual(["BANKRUPT", "LOSE_TURN", "CASH", "CASH"]);
    expect(wheel[2]).toEqual({ text: "$500", kind: "CASH", value: 500, prizeLabel: "" });
    expect(wheel[3]).toEqual({ text: "A Car!", kind: "CASH", value: 0, prizeLabel: "Car" });
    expect(Object.isFrozen(wheel[0])).toBe(true);
  });

  it("fails fast on unknown kinds", () => {
    expect(() => parseWheel([{ text: "Jackpot", type: "jackpot" }])).toThrowError(/unknown segment type 'jackpot'/);
  });

  it("rejects negative and fractional values", () => {
    expect(() => parseWheel([{ text: "$-5", type: "cash", value: -5 }])).toThrow(InvalidWheelError);
    expect(() => parseWheel([{ text: "$1.5", type: "cash", value: 1.5 }])).toThrow(InvalidWheelError);
  });

  it("rejects an empty wheel", () => {
    expect(() => parseWheel([])).toThrow(InvalidWheelError);
  });
});

describe("assertValidCatalog", () => {
  it("accepts phrases with at least one letter", () => {
    expect(() => assertValidCatalog({ Place: ["Route 66"], Thing: ["A"] })).not.toThrow();
  });

  it("rejects phrases without letters to guess", () => {
    expect(() => assertValidCatalog({ Year: ["1999", "2024"] })).toThrowError(/entry 0 in 'Year' has no letters to guess/);
    expect(() => assertValidPhrase("42 - 7")).toThrow(InvalidPhraseDataError);
  });
});
