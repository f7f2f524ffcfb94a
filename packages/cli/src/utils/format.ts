import type { ReviewStatus } from "@inktrail/history";

export type HistoryEntry =
  | {
      index: number;
      createdAt: number;
      strokes: number;
      points: number;
      bookmarked: boolean;
    }
  | { index: number; bookmarked: boolean; error: string };

export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function formatHistoryTable(entries: readonly HistoryEntry[]): string[] {
  const lines = ["INDEX\tCREATED\tSTROKES\tPOINTS\tBOOKMARK"];
  for (const entry of entries) {
    const mark = entry.bookmarked ? "*" : "-";
    if ("error" in entry) {
      lines.push(`${entry.index}\tcorrupt\t-\t-\t${mark}`);
      continue;
    }
    lines.push(
      `${entry.index}\t${formatTimestamp(entry.createdAt)}\t${entry.strokes}\t${entry.points}\t${mark}`
    );
  }
  return lines;
}

export function formatReviewStatus(status: ReviewStatus): string[] {
  return [
    `done: ${status.done ? "yes" : "no"}`,
    `flagged: ${status.flagged ? "yes" : "no"}`,
    `updated: ${status.updatedAt > 0 ? formatTimestamp(status.updatedAt) : "never"}`,
  ];
}
