import { describe, expect, it } from "vitest";
import { countBy, duplicates, sum, uniq } from "../array";
import { formatDuration } from "../date";

describe("array utils", () => {
  it("deduplicates keeping first occurrences", () => {
    expect(uniq(["b", "a", "b", "c", "a"])).toEqual(["b", "a", "c"]);
  });

  it("lists repeated values in first-occurrence order", () => {
    expect(duplicates(["Ion", "Prime", "Reaver", "Prime", "Ion", "Prime"])).toEqual(["Ion", "Prime"]);
    expect(duplicates(["a", "b"])).toEqual([]);
  });

  it("sums and counts", () => {
    expect(sum([])).toBe(0);
    expect(sum([875, 1775])).toBe(2650);
    expect(countBy(["Vandal", "Ghost", "Vandal"], (w) => w)).toEqual({ Vandal: 2, Ghost: 1 });
  });
});

describe("formatDuration", () => {
  it.each([
    [45, "45s"],
    [125, "2m5s"],
    [3600, "1h0m0s"],
    [5445.9, "1h30m45s"],
  ])("formats %f seconds as %s", (sec, expected) => {
    expect(formatDuration(sec)).toBe(expected);
  });
});
