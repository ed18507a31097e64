import type {
  Recommendation,
  RecommendationConfig,
  RecommendationResult,
  ScoredPair,
} from "./types.js";

export const DEFAULT_RECOMMENDATION_CONFIG: RecommendationConfig = {
  scoreThreshold: 0.97,
  minSupport: 50,
  topN: 10,
};

export function queryRecommendations(
  pairs: Iterable<ScoredPair>,
  targetItemId: number,
  config: RecommendationConfig,
): RecommendationResult {
  const candidates: Recommendation[] = [];
  for (const pair of pairs) {
    if (pair.itemA !== targetItemId && pair.itemB !== targetItemId) {
      continue;
    }
    if (
      pair.score <= config.scoreThreshold ||
      pair.supportCount <= config.minSupport
    ) {
      continue;
    }
    candidates.push({
      itemId: pair.itemA === targetItemId ? pair.itemB : pair.itemA,
      score: pair.score,
      supportCount: pair.supportCount,
    });
  }

  const limit = Math.max(config.topN, 0);
  const byScore = [...candidates]
    .sort(
      (left, right) => right.score - left.score || left.itemId - right.itemId,
    )
    .slice(0, limit);
  const bySupport = [...candidates]
    .sort(
      (left, right) =>
        right.supportCount - left.supportCount || left.itemId - right.itemId,
    )
    .slice(0, limit);

  return { byScore, bySupport };
}
