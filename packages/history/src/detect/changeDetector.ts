import type { AnnotationState, Point, Stroke, Viewport } from "../types";

export interface ViewTolerance {
  /** Maximum zoom difference still treated as equal; defaults to 0.01. */
  zoom?: number;
  /** Maximum per-axis center difference still treated as equal; defaults to 0.1. */
  center?: number;
}

export interface ChangeDetectorOptions {
  /** Maximum per-coordinate difference still treated as equal. */
  coordinateTolerance?: number;
  viewTolerance?: ViewTolerance;
}

export const DEFAULT_ZOOM_TOLERANCE = 0.01;
export const DEFAULT_CENTER_TOLERANCE = 0.1;

function checkTolerance(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a finite non-negative number`);
  }
  return value;
}

function within(a: number, b: number, tolerance: number): boolean {
  return tolerance === 0 ? a === b : Math.abs(a - b) <= tolerance;
}

/**
 * Order-sensitive structural comparison of annotation states.
 *
 * Stroke order and point order both count; colors and stroke kinds compare as
 * strings. A moved or zoomed view is a change; image dimensions are not.
 */
export class ChangeDetector {
  private readonly tolerance: number;
  private readonly zoomTolerance: number;
  private readonly centerTolerance: number;

  constructor(options: ChangeDetectorOptions = {}) {
    this.tolerance = checkTolerance("coordinateTolerance", options.coordinateTolerance ?? 0);
    this.zoomTolerance = checkTolerance(
      "viewTolerance.zoom",
      options.viewTolerance?.zoom ?? DEFAULT_ZOOM_TOLERANCE
    );
    this.centerTolerance = checkTolerance(
      "viewTolerance.center",
      options.viewTolerance?.center ?? DEFAULT_CENTER_TOLERANCE
    );
  }

  shouldSave(candidate: AnnotationState, lastSaved: AnnotationState | undefined): boolean {
    if (lastSaved === undefined) {
      return true;
    }
    return !this.equals(candidate, lastSaved);
  }

  equals(a: AnnotationState, b: AnnotationState): boolean {
    if (a === b) {
      return true;
    }
    if (!this.viewEquals(a.view, b.view)) {
      return false;
    }
    if (a.strokes.length !== b.strokes.length) {
      return false;
    }
    return a.strokes.every((stroke, i) => this.strokeEquals(stroke, b.strokes[i]));
  }

  private viewEquals(a: Viewport | undefined, b: Viewport | undefined): boolean {
    if (a === undefined || b === undefined) {
      return a === b;
    }
    return (
      within(a.zoom, b.zoom, this.zoomTolerance) &&
      within(a.center[0], b.center[0], this.centerTolerance) &&
      within(a.center[1], b.center[1], this.centerTolerance)
    );
  }

  private strokeEquals(a: Stroke, b: Stroke): boolean {
    if (a.type !== b.type || a.color !== b.color || a.thickness !== b.thickness) {
      return false;
    }
    if (a.points.length !== b.points.length) {
      return false;
    }
    return a.points.every((point, i) => this.pointEquals(point, b.points[i]));
  }

  private pointEquals(a: Point, b: Point): boolean {
    return within(a[0], b[0], this.tolerance) && within(a[1], b[1], this.tolerance);
  }
}
