import { AggregationOverflowError } from "./errors.js";
import { expandPairs } from "./pair-expander.js";
import type {
  PairAggregate,
  PairContribution,
  PairKey,
  PairTable,
  UserProfile,
} from "./types.js";

export interface AggregateOptions {
  partitions?: number;
}

export interface AggregationResult {
  table: ReadonlyMap<PairKey, Readonly<PairAggregate>>;
  userCount: number;
  contributionCount: number;
}

export function pairKey(itemA: number, itemB: number): PairKey {
  return `${itemA}:${itemB}`;
}

export function absorbContribution(
  table: PairTable,
  contribution: PairContribution,
): PairAggregate {
  const { itemA, itemB, valueA, valueB } = contribution;
  if (itemA >= itemB) {
    throw new Error(
      `Pair contributions must list the lower item first: ${pairKey(itemA, itemB)}`,
    );
  }
  const key = pairKey(itemA, itemB);
  const current = table.get(key);
  const next = checked({
    itemA,
    itemB,
    sumProduct: (current?.sumProduct ?? 0) + valueA * valueB,
    sumSqA: (current?.sumSqA ?? 0) + valueA * valueA,
    sumSqB: (current?.sumSqB ?? 0) + valueB * valueB,
    supportCount: (current?.supportCount ?? 0) + 1,
  });

  if (current) {
    Object.assign(current, next);
    return current;
  }
  table.set(key, next);
  return next;
}

/**
 * Merges two partial aggregates of the same pair. Associative and
 * commutative, so partial tables built in any order or split combine to the
 * same result.
 */
export function combineAggregates(
  left: PairAggregate,
  right: PairAggregate,
): PairAggregate {
  if (left.itemA !== right.itemA || left.itemB !== right.itemB) {
    throw new Error(
      `Cannot combine aggregates of different pairs: ${pairKey(left.itemA, left.itemB)} and ${pairKey(right.itemA, right.itemB)}`,
    );
  }

  return checked({
    itemA: left.itemA,
    itemB: left.itemB,
    sumProduct: left.sumProduct + right.sumProduct,
    sumSqA: left.sumSqA + right.sumSqA,
    sumSqB: left.sumSqB + right.sumSqB,
    supportCount: left.supportCount + right.supportCount,
  });
}

export function mergePairTables(
  left: ReadonlyMap<PairKey, PairAggregate>,
  right: ReadonlyMap<PairKey, PairAggregate>,
): PairTable {
  const merged: PairTable = new Map();
  for (const [key, aggregate] of left.entries()) {
    merged.set(key, { ...aggregate });
  }
  for (const [key, aggregate] of right.entries()) {
    const current = merged.get(key);
    merged.set(
      key,
      current ? combineAggregates(current, aggregate) : { ...aggregate },
    );
  }
  return merged;
}

/**
 * Expands every profile and folds its contributions into one of `partitions`
 * independent tables, assigned round-robin per user so a user's pairs all land
 * in the same table exactly once. The partial tables are merged at the end.
 */
export function aggregateProfiles(
  profiles: Iterable<UserProfile>,
  options: AggregateOptions = {},
): AggregationResult {
  const partitions = options.partitions ?? 1;
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new Error(`Invalid partition count: ${partitions}`);
  }

  // Tables are created on first use; at most one per user.
  const tables = new Map<number, PairTable>();
  let userCount = 0;
  let contributionCount = 0;

  for (const profile of profiles) {
    const slot = userCount % partitions;
    let slotTable = tables.get(slot);
    if (!slotTable) {
      slotTable = new Map();
      tables.set(slot, slotTable);
    }
    for (const contribution of expandPairs(profile)) {
      absorbContribution(slotTable, contribution);
      contributionCount += 1;
    }
    userCount += 1;
  }

  let table: PairTable = new Map();
  for (const partial of tables.values()) {
    table = table.size === 0 ? partial : mergePairTables(table, partial);
  }
  for (const aggregate of table.values()) {
    Object.freeze(aggregate);
  }

  return { table, userCount, contributionCount };
}

function checked(aggregate: PairAggregate): PairAggregate {
  const fields = ["sumProduct", "sumSqA", "sumSqB", "supportCount"] as const;
  for (const field of fields) {
    const value = aggregate[field];
    if (!Number.isFinite(value) || Math.abs(value) > Number.MAX_SAFE_INTEGER) {
      throw new AggregationOverflowError(
        pairKey(aggregate.itemA, aggregate.itemB),
        field,
        value,
      );
    }
  }
  return aggregate;
}
