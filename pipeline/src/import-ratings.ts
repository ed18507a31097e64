import { Command } from "commander";
import { importRatings, openDatabase } from "./db.js";
import { readCatalogFile, readRatingsFile } from "./ingest.js";
import { getRepoRoot, resolveFromRoot } from "./paths.js";

interface ImportOptions {
  ratings?: string;
  items?: string;
  db?: string;
}

const repoRoot = getRepoRoot(import.meta.url);

const program = new Command()
  .argument("[ratings]", "Ratings file path (positional fallback)")
  .argument("[items]", "Item catalog file path (positional fallback)")
  .argument("[db]", "SQLite path (positional fallback)")
  .option("--ratings <path>", "Tab-separated ratings file (userId itemId rating timestamp)")
  .option("--items <path>", "Pipe-separated item catalog file (itemId|name|...)")
  .option("--db <path>", "Path to SQLite database");

program.parse(process.argv);
const options = program.opts<ImportOptions>();
const [argRatings, argItems, argDb] = program.args;

const ratingsPath = resolveFromRoot(
  repoRoot,
  options.ratings,
  process.env.RATINGS_FILE,
  argRatings,
  "data/ml-100k/u.data",
);
const itemsPath = resolveFromRoot(
  repoRoot,
  options.items,
  process.env.ITEMS_FILE,
  argItems,
  "data/ml-100k/u.item",
);
const dbPath = resolveFromRoot(
  repoRoot,
  options.db,
  process.env.SIMILARITY_DB,
  argDb,
  "data/ratings.sqlite",
);

const db = openDatabase(dbPath);
try {
  process.stdout.write(`Reading catalog ${itemsPath}... `);
  const names = readCatalogFile(itemsPath);
  process.stdout.write(`done (${names.size} items)\n`);

  process.stdout.write(`Importing ratings ${ratingsPath}... `);
  const { ratingCount } = importRatings(db, readRatingsFile(ratingsPath), names);
  process.stdout.write(`done (${ratingCount} ratings)\n`);
  process.stdout.write(`Database written: ${dbPath}\n`);
} finally {
  db.close();
}
