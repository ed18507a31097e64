import { aggregateProfiles } from "./pair-aggregator.js";
import { filterRatings } from "./rating-filter.js";
import {
  DEFAULT_RECOMMENDATION_CONFIG,
  queryRecommendations,
} from "./recommendation-query.js";
import { scoreAggregates } from "./similarity-scorer.js";
import type {
  GroupingOrder,
  Rating,
  RecommendationConfig,
  RecommendationResult,
  ScoredPair,
  SimilarityIndex,
} from "./types.js";
import { groupByUser } from "./user-grouper.js";

export interface BuildIndexOptions {
  minRating?: number;
  ordering?: GroupingOrder;
  partitions?: number;
}

export function buildSimilarityIndex(
  ratings: Iterable<Rating>,
  options: BuildIndexOptions = {},
): SimilarityIndex {
  let ratingsRead = 0;
  let ratingsKept = 0;

  const counted = tap(ratings, () => {
    ratingsRead += 1;
  });
  const kept = tap(filterRatings(counted, { minRating: options.minRating }), () => {
    ratingsKept += 1;
  });
  const profiles = groupByUser(kept, { ordering: options.ordering });
  const { table, userCount, contributionCount } = aggregateProfiles(profiles, {
    partitions: options.partitions,
  });

  const pairs = Object.freeze(scoreAggregates(table.values()));
  const byItem = new Map<number, ScoredPair[]>();
  for (const pair of pairs) {
    appendTo(byItem, pair.itemA, pair);
    appendTo(byItem, pair.itemB, pair);
  }

  return {
    pairs,
    byItem,
    stats: {
      ratingsRead,
      ratingsKept,
      userCount,
      contributionCount,
      pairCount: pairs.length,
    },
  };
}

export function recommendSimilarItems(
  index: SimilarityIndex,
  targetItemId: number,
  config: Partial<RecommendationConfig> = {},
): RecommendationResult {
  return queryRecommendations(index.byItem.get(targetItemId) ?? [], targetItemId, {
    scoreThreshold:
      config.scoreThreshold ?? DEFAULT_RECOMMENDATION_CONFIG.scoreThreshold,
    minSupport: config.minSupport ?? DEFAULT_RECOMMENDATION_CONFIG.minSupport,
    topN: config.topN ?? DEFAULT_RECOMMENDATION_CONFIG.topN,
  });
}

function* tap<T>(source: Iterable<T>, onItem: (item: T) => void): Generator<T> {
  for (const item of source) {
    onItem(item);
    yield item;
  }
}

function appendTo(
  byItem: Map<number, ScoredPair[]>,
  itemId: number,
  pair: ScoredPair,
): void {
  const list = byItem.get(itemId);
  if (list) {
    list.push(pair);
  } else {
    byItem.set(itemId, [pair]);
  }
}
