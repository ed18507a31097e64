import { Command } from "commander";
import { createCatalogLookup } from "./catalog.js";
import { iterateRatings, loadCatalog, openDatabase } from "./db.js";
import { formatRecommendations } from "./format.js";
import { parseId, readCatalogFile, readRatingsFile } from "./ingest.js";
import {
  parseNonNegativeInt,
  parsePositiveInt,
  parseScoreThreshold,
} from "./options.js";
import { getRepoRoot, resolveFromRoot } from "./paths.js";
import {
  buildSimilarityIndex,
  recommendSimilarItems,
} from "./similarity-engine.js";
import type { SimilarityIndex } from "./types.js";

interface RecommendOptions {
  ratings?: string;
  items?: string;
  db?: string;
  minRating?: string;
  scoreThreshold?: string;
  minSupport?: string;
  topN?: string;
  partitions?: string;
}

interface LoadedRatings {
  index: SimilarityIndex;
  names: Map<number, string>;
}

const repoRoot = getRepoRoot(import.meta.url);
const program = new Command()
  .argument("[itemId]", "Item to find similar items for")
  .option("--ratings <path>", "Ratings file (ignored when --db is set)")
  .option("--items <path>", "Item catalog file (ignored when --db is set)")
  .option("--db <path>", "Read ratings and catalog from this SQLite database")
  .option("--min-rating <value>", "Discard ratings below this value")
  .option("--score-threshold <value>", "Keep pairs scoring above this value")
  .option("--min-support <count>", "Keep pairs with more shared raters than this")
  .option("--top-n <count>", "Number of recommendations per ranking")
  .option(
    "--partitions <count>",
    "Number of partial pair tables merged after aggregation",
  );

program.parse(process.argv);
const options = program.opts<RecommendOptions>();
const [argItemId] = program.args;

const rawTarget = argItemId ?? process.env.TARGET_ITEM;
if (!rawTarget) {
  throw new Error(
    'No target item provided. Pass an item id, e.g. "recommend 50", or set TARGET_ITEM.',
  );
}
const targetItemId = parseId(rawTarget, "item id");

const minRating = parseNonNegativeInt(
  options.minRating ?? process.env.MIN_RATING ?? "3",
  "min-rating",
);
const scoreThreshold = parseScoreThreshold(
  options.scoreThreshold ?? process.env.SCORE_THRESHOLD ?? "0.97",
  "score-threshold",
);
const minSupport = parseNonNegativeInt(
  options.minSupport ?? process.env.MIN_SUPPORT ?? "50",
  "min-support",
);
const topN = parsePositiveInt(
  options.topN ?? process.env.TOP_N ?? "10",
  "top-n",
);
const partitions = parsePositiveInt(
  options.partitions ?? process.env.AGGREGATION_PARTITIONS ?? "1",
  "partitions",
);

const dbOption = options.db ?? process.env.SIMILARITY_DB;
const startedAt = Date.now();
const { index, names } = dbOption
  ? loadFromDatabase(resolveFromRoot(repoRoot, dbOption))
  : loadFromFiles(
      resolveFromRoot(
        repoRoot,
        options.ratings,
        process.env.RATINGS_FILE,
        "data/ml-100k/u.data",
      ),
      resolveFromRoot(
        repoRoot,
        options.items,
        process.env.ITEMS_FILE,
        "data/ml-100k/u.item",
      ),
    );

const { stats } = index;
process.stdout.write(
  `Similarity stats: ${stats.ratingsKept}/${stats.ratingsRead} ratings kept, ${stats.userCount} users, ${stats.contributionCount} contributions, ${stats.pairCount} pairs (${Date.now() - startedAt} ms)\n\n`,
);

const result = recommendSimilarItems(index, targetItemId, {
  scoreThreshold,
  minSupport,
  topN,
});
process.stdout.write(
  formatRecommendations(result, targetItemId, createCatalogLookup(names), topN),
);

function loadFromDatabase(dbPath: string): LoadedRatings {
  const db = openDatabase(dbPath, { fileMustExist: true });
  try {
    process.stdout.write(`Loading ratings from ${dbPath}\n`);
    return {
      names: loadCatalog(db),
      index: buildSimilarityIndex(iterateRatings(db), {
        minRating,
        ordering: "contiguous",
        partitions,
      }),
    };
  } finally {
    db.close();
  }
}

function loadFromFiles(ratingsPath: string, itemsPath: string): LoadedRatings {
  process.stdout.write(`Loading ratings from ${ratingsPath}\n`);
  return {
    names: readCatalogFile(itemsPath),
    index: buildSimilarityIndex(readRatingsFile(ratingsPath), {
      minRating,
      partitions,
    }),
  };
}
