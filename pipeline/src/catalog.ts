import { UnknownItemError } from "./errors.js";
import type { CatalogLookup } from "./types.js";

export function createCatalogLookup(
  names: ReadonlyMap<number, string>,
): CatalogLookup {
  return (itemId) => {
    const name = names.get(itemId);
    if (name === undefined) {
      throw new UnknownItemError(itemId);
    }
    return name;
  };
}

export function displayName(lookup: CatalogLookup, itemId: number): string {
  try {
    return lookup(itemId);
  } catch (error) {
    if (error instanceof UnknownItemError) {
      return `Item #${itemId}`;
    }
    throw error;
  }
}
