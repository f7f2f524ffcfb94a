import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  containsSorted,
  insertSorted,
  lowerBound,
  normalizeIndices,
  predecessor,
  successor,
} from "../utils/sortedIndices";

describe("sortedIndices", () => {
  const values = [2, 5, 9, 14];

  it("finds lower bounds", () => {
    expect(lowerBound(values, 0)).toBe(0);
    expect(lowerBound(values, 5)).toBe(1);
    expect(lowerBound(values, 6)).toBe(2);
    expect(lowerBound(values, 20)).toBe(4);
  });

  it("answers membership", () => {
    expect(containsSorted(values, 9)).toBe(true);
    expect(containsSorted(values, 10)).toBe(false);
    expect(containsSorted([], 0)).toBe(false);
  });

  it("returns strict neighbours", () => {
    expect(predecessor(values, 9)).toBe(5);
    expect(predecessor(values, 10)).toBe(9);
    expect(predecessor(values, 2)).toBeUndefined();
    expect(successor(values, 9)).toBe(14);
    expect(successor(values, 3)).toBe(5);
    expect(successor(values, 14)).toBeUndefined();
  });

  it("inserts in order without duplicates", () => {
    const list = [1, 4];
    expect(insertSorted(list, 3)).toBe(true);
    expect(insertSorted(list, 3)).toBe(false);
    expect(insertSorted(list, 0)).toBe(true);
    expect(list).toEqual([0, 1, 3, 4]);
  });

  it("normalizes arbitrary input", () => {
    expect(normalizeIndices([7, 3, 3, -1, 2.5, 0])).toEqual([0, 3, 7]);
  });

  it("agrees with a linear scan", () => {
    fc.assert(
      fc.property(fc.array(fc.nat(200)), fc.nat(200), (raw, query) => {
        const sorted = normalizeIndices(raw);
        const below = sorted.filter((value) => value < query);
        const above = sorted.filter((value) => value > query);
        expect(predecessor(sorted, query)).toBe(below.at(-1));
        expect(successor(sorted, query)).toBe(above[0]);
        expect(containsSorted(sorted, query)).toBe(sorted.includes(query));
      })
    );
  });
});
