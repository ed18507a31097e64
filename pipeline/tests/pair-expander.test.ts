import { describe, expect, it } from "vitest";
import { countPairs, expandPairs } from "../src/pair-expander.js";
import type { UserProfile } from "../src/types.js";

function profile(entries: [number, number][]): UserProfile {
  return { userId: 1, ratings: new Map(entries) };
}

describe("expandPairs", () => {
  it("emits C(k,2) contributions with the lower item id first", () => {
    const contributions = [
      ...expandPairs(
        profile([
          [30, 3],
          [10, 5],
          [20, 4],
          [5, 3],
        ]),
      ),
    ];

    expect(contributions).toHaveLength(countPairs(4));
    expect(contributions).toHaveLength(6);
    for (const contribution of contributions) {
      expect(contribution.itemA).toBeLessThan(contribution.itemB);
    }
    expect(contributions).toContainEqual({
      itemA: 10,
      itemB: 30,
      valueA: 5,
      valueB: 3,
    });
  });

  it("produces every unordered pair exactly once", () => {
    const contributions = [
      ...expandPairs(
        profile([
          [3, 3],
          [1, 4],
          [2, 5],
        ]),
      ),
    ];

    expect(contributions.map((c) => `${c.itemA}:${c.itemB}`)).toEqual([
      "1:2",
      "1:3",
      "2:3",
    ]);
  });

  it("emits nothing for a user with a single rating", () => {
    expect([...expandPairs(profile([[42, 5]]))]).toEqual([]);
    expect(countPairs(1)).toBe(0);
    expect(countPairs(0)).toBe(0);
  });
});
