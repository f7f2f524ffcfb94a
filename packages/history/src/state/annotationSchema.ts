/**
 * Annotation Record Schemas
 *
 * Runtime validation for annotation states coming from storage or from the
 * rendering surface, and for the persisted snapshot record envelope.
 */

import { z } from "zod";
import { SerializationError } from "../errors";
import type { AnnotationState, ReviewStatus, Snapshot } from "../types";

export const SNAPSHOT_RECORD_VERSION = 1;

export const PointSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const StrokeSchema = z.object({
  points: z.array(PointSchema),
  color: z.string().min(1),
  thickness: z.number().finite().positive(),
  type: z.string().min(1).optional(),
});

export const ViewportSchema = z.object({
  zoom: z.number().finite(),
  center: PointSchema,
});

export const ImageDimensionsSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const AnnotationStateSchema = z.object({
  strokes: z.array(StrokeSchema),
  view: ViewportSchema.optional(),
  imageDimensions: ImageDimensionsSchema.optional(),
});

export const SnapshotRecordSchema = z.object({
  version: z.literal(SNAPSHOT_RECORD_VERSION),
  index: z.number().int().nonnegative(),
  createdAt: z.number().int().nonnegative(),
  state: AnnotationStateSchema,
});

export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;

export function formatValidationError(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Validates an annotation state. Throws SerializationError on mismatch.
 */
export function parseAnnotationState(data: unknown, index?: number): AnnotationState {
  const result = AnnotationStateSchema.safeParse(data);
  if (!result.success) {
    const where = index === undefined ? "" : ` at index ${index}`;
    throw new SerializationError(
      `Invalid annotation state${where}: ${formatValidationError(result.error.issues)}`,
      { index, context: { issues: result.error.issues.length } }
    );
  }
  return result.data;
}

export function encodeSnapshotRecord(snapshot: Snapshot): string {
  const record: SnapshotRecord = {
    version: SNAPSHOT_RECORD_VERSION,
    index: snapshot.index,
    createdAt: snapshot.createdAt,
    state: snapshot.state,
  };
  return JSON.stringify(record);
}

/**
 * Decodes a stored record. The record must carry the index it is stored under.
 */
export function decodeSnapshotRecord(raw: string, expectedIndex: number): Snapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`Snapshot ${expectedIndex} is not valid JSON`, {
      index: expectedIndex,
      cause: error,
    });
  }

  const result = SnapshotRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw new SerializationError(
      `Snapshot ${expectedIndex} is malformed: ${formatValidationError(result.error.issues)}`,
      { index: expectedIndex }
    );
  }

  if (result.data.index !== expectedIndex) {
    throw new SerializationError(
      `Snapshot stored at ${expectedIndex} claims index ${result.data.index}`,
      { index: expectedIndex }
    );
  }

  return {
    index: result.data.index,
    createdAt: result.data.createdAt,
    state: result.data.state,
  };
}

export function countPoints(state: AnnotationState): number {
  return state.strokes.reduce((total, stroke) => total + stroke.points.length, 0);
}

export const BookmarkListSchema = z.array(z.number().int().nonnegative());

export const ReviewStatusSchema = z.object({
  done: z.boolean(),
  flagged: z.boolean(),
  updatedAt: z.number().int().nonnegative(),
});

function parseJsonDocument<T>(raw: string, schema: z.ZodType<T>, label: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`${label} is not valid JSON`, { cause: error });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new SerializationError(
      `${label} is malformed: ${formatValidationError(result.error.issues)}`
    );
  }
  return result.data;
}

export function decodeBookmarks(raw: string): number[] {
  return parseJsonDocument(raw, BookmarkListSchema, "Bookmark list");
}

export function decodeReviewStatus(raw: string): ReviewStatus {
  return parseJsonDocument(raw, ReviewStatusSchema, "Review status");
}
