import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { MalformedInputError } from "./errors.js";
import type { Rating } from "./types.js";

interface RatingRow {
  userId: unknown;
  itemId: unknown;
  value: unknown;
}

interface ItemRow {
  id: number;
  name: string;
}

export interface OpenDatabaseOptions {
  fileMustExist?: boolean;
}

export function openDatabase(
  dbPath: string,
  options: OpenDatabaseOptions = {},
): Database.Database {
  const fileMustExist = options.fileMustExist ?? false;
  if (fileMustExist) {
    if (!fs.existsSync(dbPath)) {
      throw new Error(`Database not found: ${dbPath}`);
    }
  } else if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist });
  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS items (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS ratings (
      user_id INTEGER NOT NULL,
      item_id INTEGER NOT NULL,
      value INTEGER NOT NULL,
      PRIMARY KEY (user_id, item_id)
    );
  `);

  return db;
}

export function upsertItem(
  db: Database.Database,
  itemId: number,
  name: string,
): void {
  db.prepare<[number, string]>(
    `
      INSERT INTO items (id, name)
      VALUES (?, ?)
      ON CONFLICT(id) DO UPDATE SET name = excluded.name;
    `,
  ).run(itemId, name);
}

export function upsertRating(db: Database.Database, rating: Rating): void {
  db.prepare<[number, number, number]>(
    `
      INSERT INTO ratings (user_id, item_id, value)
      VALUES (?, ?, ?)
      ON CONFLICT(user_id, item_id) DO UPDATE SET value = excluded.value;
    `,
  ).run(rating.userId, rating.itemId, rating.value);
}

export function importRatings(
  db: Database.Database,
  ratings: Iterable<Rating>,
  names: ReadonlyMap<number, string>,
): { ratingCount: number; itemCount: number } {
  const tx = db.transaction(() => {
    let ratingCount = 0;
    for (const [itemId, name] of names.entries()) {
      upsertItem(db, itemId, name);
    }
    for (const rating of ratings) {
      upsertRating(db, rating);
      ratingCount += 1;
    }
    return { ratingCount, itemCount: names.size };
  });

  return tx();
}

// Rows come back grouped by user, which lets the grouper stream them.
export function* iterateRatings(db: Database.Database): Generator<Rating> {
  const rows = db
    .prepare<[], RatingRow>(
      `
        SELECT
          user_id AS userId,
          item_id AS itemId,
          value
        FROM ratings
        ORDER BY user_id, item_id;
      `,
    )
    .iterate();

  for (const row of rows) {
    const { userId, itemId, value } = row;
    if (
      !isSafeInteger(userId) ||
      !isSafeInteger(itemId) ||
      !isSafeInteger(value)
    ) {
      throw new MalformedInputError(
        `Invalid rating row: ${JSON.stringify(row)}`,
        "ratings table",
      );
    }
    yield { userId, itemId, value };
  }
}

export function loadCatalog(db: Database.Database): Map<number, string> {
  const rows = db
    .prepare<[], ItemRow>("SELECT id, name FROM items ORDER BY id")
    .all();
  return new Map(rows.map((row) => [row.id, row.name]));
}

function isSafeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}
