export interface Rating {
  readonly userId: number;
  readonly itemId: number;
  readonly value: number;
}

export interface UserProfile {
  userId: number;
  ratings: ReadonlyMap<number, number>;
}

export interface PairContribution {
  itemA: number;
  itemB: number;
  valueA: number;
  valueB: number;
}

export interface PairAggregate {
  itemA: number;
  itemB: number;
  sumProduct: number;
  sumSqA: number;
  sumSqB: number;
  supportCount: number;
}

export type PairKey = `${number}:${number}`;
export type PairTable = Map<PairKey, PairAggregate>;

export interface ScoredPair {
  readonly itemA: number;
  readonly itemB: number;
  readonly score: number;
  readonly supportCount: number;
}

export interface Recommendation {
  itemId: number;
  score: number;
  supportCount: number;
}

export interface RecommendationConfig {
  scoreThreshold: number;
  minSupport: number;
  topN: number;
}

export interface RecommendationResult {
  byScore: Recommendation[];
  bySupport: Recommendation[];
}

export type GroupingOrder = "unordered" | "contiguous";

export interface SimilarityStats {
  ratingsRead: number;
  ratingsKept: number;
  userCount: number;
  contributionCount: number;
  pairCount: number;
}

export interface SimilarityIndex {
  pairs: readonly ScoredPair[];
  byItem: ReadonlyMap<number, readonly ScoredPair[]>;
  stats: SimilarityStats;
}

export type CatalogLookup = (itemId: number) => string;
