import type { PairAggregate, ScoredPair } from "./types.js";

export function cosineScore(
  sumProduct: number,
  sumSqA: number,
  sumSqB: number,
): number {
  const denominator = Math.sqrt(sumSqA) * Math.sqrt(sumSqB);
  if (denominator === 0) {
    return 0;
  }
  // sqrt rounding can push identical vectors a hair above 1
  return Math.min(sumProduct / denominator, 1);
}

export function scorePair(aggregate: Readonly<PairAggregate>): ScoredPair {
  return Object.freeze({
    itemA: aggregate.itemA,
    itemB: aggregate.itemB,
    score: cosineScore(aggregate.sumProduct, aggregate.sumSqA, aggregate.sumSqB),
    supportCount: aggregate.supportCount,
  });
}

export function scoreAggregates(
  aggregates: Iterable<Readonly<PairAggregate>>,
): ScoredPair[] {
  const scored: ScoredPair[] = [];
  for (const aggregate of aggregates) {
    scored.push(scorePair(aggregate));
  }
  return scored;
}
