import { describe, expect, it } from "vitest";
import { ChangeDetector } from "../detect/changeDetector";
import type { AnnotationState } from "../types";
import { stateOf, stroke } from "./fixtures";

describe("ChangeDetector", () => {
  const detector = new ChangeDetector();

  it("saves when nothing has been saved yet", () => {
    expect(detector.shouldSave(stateOf(), undefined)).toBe(true);
  });

  it("compares by value, not identity", () => {
    expect(detector.shouldSave(stateOf(1, 2), stateOf(1, 2))).toBe(false);
  });

  it("treats stroke order as significant", () => {
    expect(detector.shouldSave(stateOf(2, 1), stateOf(1, 2))).toBe(true);
  });

  it("treats point order as significant", () => {
    const original = stroke(1);
    const reversed = { ...original, points: [...original.points].reverse() };
    expect(detector.shouldSave({ strokes: [reversed] }, { strokes: [original] })).toBe(true);
  });

  it("detects color, thickness and length changes", () => {
    expect(detector.shouldSave({ strokes: [stroke(1, "#00ff00")] }, stateOf(1))).toBe(true);
    expect(detector.shouldSave({ strokes: [{ ...stroke(1), thickness: 3 }] }, stateOf(1))).toBe(
      true
    );
    expect(detector.shouldSave(stateOf(1, 2, 3), stateOf(1, 2))).toBe(true);
  });

  it("applies a coordinate tolerance when configured", () => {
    const tolerant = new ChangeDetector({ coordinateTolerance: 0.01 });
    const base = stroke(1);
    const nudged = {
      ...base,
      points: base.points.map(([x, y]): [number, number] => [x + 0.005, y]),
    };

    expect(tolerant.shouldSave({ strokes: [nudged] }, { strokes: [base] })).toBe(false);
    expect(detector.shouldSave({ strokes: [nudged] }, { strokes: [base] })).toBe(true);
  });

  it("treats a different stroke kind as a change", () => {
    const polyline = { ...stroke(1), type: "polyline" };
    expect(detector.shouldSave({ strokes: [polyline] }, stateOf(1))).toBe(true);
    expect(detector.shouldSave({ strokes: [polyline] }, { strokes: [{ ...polyline }] })).toBe(
      false
    );
  });

  it("compares the viewport within its own tolerance", () => {
    const viewAt = (zoom: number, x: number, y: number): AnnotationState => ({
      ...stateOf(1),
      view: { zoom, center: [x, y] },
    });
    const saved = viewAt(4, 120, 80);

    expect(detector.shouldSave(viewAt(4.005, 120.05, 79.95), saved)).toBe(false);
    expect(detector.shouldSave(viewAt(4.02, 120, 80), saved)).toBe(true);
    expect(detector.shouldSave(viewAt(4, 120.2, 80), saved)).toBe(true);
    expect(detector.shouldSave(stateOf(1), saved)).toBe(true);
  });

  it("ignores image dimensions", () => {
    const measured = { ...stateOf(1), imageDimensions: { width: 4096, height: 2048 } };
    expect(detector.shouldSave(measured, stateOf(1))).toBe(false);
  });

  it("rejects a negative tolerance", () => {
    expect(() => new ChangeDetector({ coordinateTolerance: -1 })).toThrow(RangeError);
    expect(() => new ChangeDetector({ viewTolerance: { zoom: Number.NaN } })).toThrow(
      "viewTolerance.zoom must be a finite non-negative number"
    );
  });
});
