import { displayName } from "./catalog.js";
import type {
  CatalogLookup,
  Recommendation,
  RecommendationResult,
} from "./types.js";

const ENTRY_RULE = "-".repeat(80);
const SECTION_RULE = "=".repeat(80);

export function formatRecommendations(
  result: RecommendationResult,
  targetItemId: number,
  lookup: CatalogLookup,
  topN: number,
): string {
  const targetName = displayName(lookup, targetItemId);
  const lines = [
    `Top ${topN} recommendations for ${targetName} by cosine similarity of ratings:`,
    "",
    ...formatEntries(result.byScore, lookup),
    SECTION_RULE,
    `Top ${topN} recommendations for ${targetName} by number of shared raters:`,
    "",
    ...formatEntries(result.bySupport, lookup),
  ];
  return `${lines.join("\n")}\n`;
}

function formatEntries(
  entries: Recommendation[],
  lookup: CatalogLookup,
): string[] {
  if (entries.length === 0) {
    return ["No items met the thresholds."];
  }

  return entries.flatMap((entry) => [
    ENTRY_RULE,
    `${entry.supportCount} users also rated:`,
    displayName(lookup, entry.itemId),
    `Similarity Score: ${roundScore(entry.score)}`,
    "",
  ]);
}

function roundScore(value: number): number {
  return Number(value.toFixed(4));
}
