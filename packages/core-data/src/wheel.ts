import { InvalidWheelError } from "@fortune/core-errors";
import type { SegmentKind, Wheel, WheelSegment, WheelSegmentRecord } from "@fortune/core-types";

const SEGMENT_KINDS: Record<string, SegmentKind> = {
  bankrupt: "BANKRUPT",
  loseturn: "LOSE_TURN",
  cash: "CASH",
};

export function parseSegmentKind(type: string): SegmentKind {
  const kind = SEGMENT_KINDS[type.trim().toLowerCase()];
  if (!kind) {
    throw new InvalidWheelError(`Wheel: unknown segment type '${type}'`, { type });
  }
  return kind;
}

export function toWheelSegment(record: WheelSegmentRecord, index = 0): WheelSegment {
  if (typeof record.text !== "string") {
    throw new InvalidWheelError(`Wheel: segment ${index} must have a text label`, { index });
  }
  const value = record.value ?? 0;
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidWheelError(`Wheel: segment ${index} value must be a non-negative integer`, { index, value });
  }
  return Object.freeze({
    text: record.text,
    kind: parseSegmentKind(record.type),
    value,
    prizeLabel: record.prize ?? "",
  });
}

export function parseWheel(records: readonly WheelSegmentRecord[]): Wheel {
  if (records.length === 0) {
    throw new InvalidWheelError("Wheel: at least one segment is required");
  }
  return Object.freeze(records.map((record, idx) => toWheelSegment(record, idx)));
}

export function assertValidWheel(wheel: Wheel): void {
  if (wheel.length === 0) {
    throw new InvalidWheelError("Wheel: at least one segment is required");
  }
  wheel.forEach((segment, index) => {
    if (segment.kind !== "BANKRUPT" && segment.kind !== "LOSE_TURN" && segment.kind !== "CASH") {
      throw new InvalidWheelError(`Wheel: segment ${index} has an invalid kind`, { index, kind: segment.kind });
    }
    if (!Number.isInteger(segment.value) || segment.value < 0) {
      throw new InvalidWheelError(`Wheel: segment ${index} value must be a non-negative integer`, { index, value: segment.value });
    }
  });
}
