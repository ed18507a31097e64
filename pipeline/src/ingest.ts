import fs from "node:fs";
import { MalformedInputError } from "./errors.js";
import type { Rating } from "./types.js";

const INTEGER_PATTERN = /^-?\d+$/;

export function* parseRatings(
  text: string,
  source = "ratings",
): Generator<Rating> {
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (line.length === 0) {
      continue;
    }

    const lineNumber = index + 1;
    const fields = line.split(/\s+/);
    if (fields.length < 3) {
      throw new MalformedInputError(
        `Expected "userId itemId rating [timestamp]", got "${line}"`,
        source,
        lineNumber,
      );
    }

    const [userField, itemField, ratingField] = fields;
    yield {
      userId: parseId(userField, "userId", source, lineNumber),
      itemId: parseId(itemField, "itemId", source, lineNumber),
      value: parseRatingValue(ratingField, source, lineNumber),
    };
  }
}

export function parseCatalog(
  text: string,
  source = "catalog",
): Map<number, string> {
  const names = new Map<number, string>();
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (line.trim().length === 0) {
      continue;
    }

    const fields = line.split("|");
    if (fields.length < 2) {
      throw new MalformedInputError(
        `Expected "itemId|name|...", got "${line}"`,
        source,
        index + 1,
      );
    }
    const [idField, name] = fields;
    names.set(parseId(idField.trim(), "itemId", source, index + 1), name.trim());
  }
  return names;
}

export function readRatingsFile(filePath: string): Generator<Rating> {
  return parseRatings(fs.readFileSync(filePath, "utf8"), filePath);
}

// MovieLens item files are Latin-1 encoded.
export function readCatalogFile(filePath: string): Map<number, string> {
  return parseCatalog(fs.readFileSync(filePath, "latin1"), filePath);
}

export function parseId(
  raw: string,
  field: string,
  source?: string,
  line?: number,
): number {
  const parsed = INTEGER_PATTERN.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new MalformedInputError(`Invalid ${field}: "${raw}"`, source, line);
  }
  return parsed;
}

export function parseRatingValue(
  raw: string,
  source?: string,
  line?: number,
): number {
  const parsed = INTEGER_PATTERN.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new MalformedInputError(`Invalid rating: "${raw}"`, source, line);
  }
  return parsed;
}
