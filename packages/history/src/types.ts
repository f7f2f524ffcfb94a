/** A point in image coordinates */
export type Point = [x: number, y: number];

export interface Stroke {
  points: Point[];
  /** CSS color string as reported by the rendering surface */
  color: string;
  thickness: number;
  /** Annotation kind reported by the surface, e.g. "polyline" */
  type?: string;
}

/** Map viewport at the time the state was captured. */
export interface Viewport {
  zoom: number;
  center: Point;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Full annotation geometry for one image, plus the view it was drawn in.
 * Treated as an immutable value once handed to the history core.
 */
export interface AnnotationState {
  strokes: Stroke[];
  view?: Viewport;
  /** Recorded for consumers of the stored records; not compared. */
  imageDimensions?: ImageDimensions;
}

export interface Snapshot {
  index: number;
  state: AnnotationState;
  /** Epoch milliseconds */
  createdAt: number;
}

export interface ReviewStatus {
  done: boolean;
  flagged: boolean;
  /** Epoch milliseconds; 0 when never written */
  updatedAt: number;
}

export const EMPTY_REVIEW_STATUS: ReviewStatus = Object.freeze({
  done: false,
  flagged: false,
  updatedAt: 0,
});

export type NavigationDirection = "undo" | "redo" | "prev-bookmark" | "next-bookmark";
