import { describe, expect, it } from "vitest";
import { AggregationOverflowError } from "../src/errors.js";
import {
  absorbContribution,
  aggregateProfiles,
  combineAggregates,
  mergePairTables,
} from "../src/pair-aggregator.js";
import type {
  PairAggregate,
  PairContribution,
  PairTable,
  UserProfile,
} from "../src/types.js";

const contributions: PairContribution[] = [
  { itemA: 1, itemB: 2, valueA: 5, valueB: 4 },
  { itemA: 1, itemB: 2, valueA: 3, valueB: 3 },
  { itemA: 1, itemB: 3, valueA: 4, valueB: 5 },
  { itemA: 1, itemB: 2, valueA: 4, valueB: 5 },
  { itemA: 2, itemB: 3, valueA: 3, valueB: 4 },
];

function tableOf(items: PairContribution[]): PairTable {
  const table: PairTable = new Map();
  for (const contribution of items) {
    absorbContribution(table, contribution);
  }
  return table;
}

describe("absorbContribution", () => {
  it("accumulates the cosine sums and support count per pair", () => {
    const table = tableOf(contributions);

    expect(table.get("1:2")).toEqual({
      itemA: 1,
      itemB: 2,
      sumProduct: 20 + 9 + 20,
      sumSqA: 25 + 9 + 16,
      sumSqB: 16 + 9 + 25,
      supportCount: 3,
    });
    expect(table.get("2:3")).toEqual({
      itemA: 2,
      itemB: 3,
      sumProduct: 12,
      sumSqA: 9,
      sumSqB: 16,
      supportCount: 1,
    });
    expect(table.size).toBe(3);
  });

  it("rejects contributions that do not list the lower item first", () => {
    const table: PairTable = new Map();

    expect(() =>
      absorbContribution(table, { itemA: 2, itemB: 1, valueA: 3, valueB: 4 }),
    ).toThrow("Pair contributions must list the lower item first: 2:1");
    expect(() =>
      absorbContribution(table, { itemA: 5, itemB: 5, valueA: 3, valueB: 4 }),
    ).toThrow("Pair contributions must list the lower item first: 5:5");
    expect(table.size).toBe(0);
  });

  it("fails with AggregationOverflowError instead of losing precision", () => {
    const table: PairTable = new Map();
    const huge = 2 ** 27;

    expect(() =>
      absorbContribution(table, { itemA: 1, itemB: 2, valueA: huge, valueB: huge }),
    ).toThrow(AggregationOverflowError);
    expect(table.size).toBe(0);
  });
});

describe("combineAggregates", () => {
  const left: PairAggregate = {
    itemA: 1,
    itemB: 2,
    sumProduct: 20,
    sumSqA: 25,
    sumSqB: 16,
    supportCount: 1,
  };
  const right: PairAggregate = {
    itemA: 1,
    itemB: 2,
    sumProduct: 9,
    sumSqA: 9,
    sumSqB: 9,
    supportCount: 1,
  };

  it("is commutative", () => {
    expect(combineAggregates(left, right)).toEqual(combineAggregates(right, left));
  });

  it("is associative", () => {
    const third: PairAggregate = { ...left, sumProduct: 1, sumSqA: 1, sumSqB: 1 };
    expect(combineAggregates(combineAggregates(left, right), third)).toEqual(
      combineAggregates(left, combineAggregates(right, third)),
    );
  });

  it("refuses to combine different pairs", () => {
    expect(() => combineAggregates(left, { ...right, itemB: 3 })).toThrow(
      "Cannot combine aggregates of different pairs: 1:2 and 1:3",
    );
  });

  it("detects overflow while merging", () => {
    const big = { ...left, sumProduct: Number.MAX_SAFE_INTEGER };
    expect(() => combineAggregates(big, right)).toThrow(AggregationOverflowError);
  });
});

describe("mergePairTables", () => {
  it("matches the single-table result for any split of the stream", () => {
    const full = tableOf(contributions);
    for (let split = 0; split <= contributions.length; split += 1) {
      const merged = mergePairTables(
        tableOf(contributions.slice(0, split)),
        tableOf(contributions.slice(split)),
      );
      expect(merged).toEqual(full);
    }
  });

  it("does not mutate its inputs", () => {
    const left = tableOf(contributions.slice(0, 2));
    const snapshot = structuredClone(left);
    mergePairTables(left, tableOf(contributions.slice(2)));
    expect(left).toEqual(snapshot);
  });
});

describe("aggregateProfiles", () => {
  const profiles: UserProfile[] = [
    { userId: 1, ratings: new Map([[1, 5], [2, 4], [3, 3]]) },
    { userId: 2, ratings: new Map([[2, 4], [3, 5]]) },
    { userId: 3, ratings: new Map([[9, 4]]) },
    { userId: 4, ratings: new Map([[1, 3], [3, 4]]) },
  ];

  it("counts users and C(k,2) contributions per user", () => {
    const result = aggregateProfiles(profiles);

    expect(result.userCount).toBe(4);
    expect(result.contributionCount).toBe(3 + 1 + 0 + 1);
    expect(result.table.get("1:3")).toEqual({
      itemA: 1,
      itemB: 3,
      sumProduct: 15 + 12,
      sumSqA: 25 + 9,
      sumSqB: 9 + 16,
      supportCount: 2,
    });
  });

  it("gives the same table for any partition count", () => {
    const single = aggregateProfiles(profiles).table;
    for (const partitions of [2, 3, 8]) {
      expect(aggregateProfiles(profiles, { partitions }).table).toEqual(single);
    }
  });

  it("freezes the finalized aggregates", () => {
    const aggregate = aggregateProfiles(profiles).table.get("2:3");
    expect(Object.isFrozen(aggregate)).toBe(true);
  });

  it("creates partial tables only for partitions that receive users", () => {
    const single = aggregateProfiles(profiles).table;

    expect(aggregateProfiles(profiles, { partitions: 100_000_000 }).table).toEqual(
      single,
    );
    expect(aggregateProfiles([], { partitions: 100_000_000 })).toEqual({
      table: new Map(),
      userCount: 0,
      contributionCount: 0,
    });
  });

  it("aborts the whole run when any accumulator overflows", () => {
    const huge = 2 ** 27;
    const withOverflow: UserProfile[] = [
      ...profiles,
      { userId: 5, ratings: new Map([[1, huge], [2, huge]]) },
    ];

    let result: unknown;
    expect(() => {
      result = aggregateProfiles(withOverflow, { partitions: 2 });
    }).toThrow(AggregationOverflowError);
    expect(result).toBeUndefined();
  });

  it("rejects a non-positive partition count", () => {
    expect(() => aggregateProfiles(profiles, { partitions: 0 })).toThrow(
      "Invalid partition count: 0",
    );
  });
});
