import { MalformedInputError } from "./errors.js";
import type { GroupingOrder, Rating, UserProfile } from "./types.js";

export interface UserGrouperOptions {
  ordering?: GroupingOrder;
}

/**
 * Groups ratings into one profile per user. A later rating for the same
 * (user, item) replaces the earlier one.
 *
 * "unordered" buffers every user's partial profile before emitting anything.
 * "contiguous" keeps a single user resident and emits as soon as the user id
 * changes, so the source must yield each user's ratings as one run.
 */
export function groupByUser(
  ratings: Iterable<Rating>,
  options: UserGrouperOptions = {},
): Generator<UserProfile> {
  return options.ordering === "contiguous"
    ? groupContiguous(ratings)
    : groupBuffered(ratings);
}

function* groupBuffered(ratings: Iterable<Rating>): Generator<UserProfile> {
  const byUser = new Map<number, Map<number, number>>();
  for (const rating of ratings) {
    let items = byUser.get(rating.userId);
    if (!items) {
      items = new Map();
      byUser.set(rating.userId, items);
    }
    items.set(rating.itemId, rating.value);
  }

  for (const [userId, items] of byUser.entries()) {
    yield { userId, ratings: items };
  }
}

function* groupContiguous(ratings: Iterable<Rating>): Generator<UserProfile> {
  const emitted = new Set<number>();
  let current: { userId: number; items: Map<number, number> } | undefined;

  for (const rating of ratings) {
    if (current && current.userId !== rating.userId) {
      emitted.add(current.userId);
      yield { userId: current.userId, ratings: current.items };
      current = undefined;
    }

    if (!current) {
      if (emitted.has(rating.userId)) {
        throw new MalformedInputError(
          `Ratings for user ${rating.userId} are not contiguous`,
        );
      }
      current = { userId: rating.userId, items: new Map() };
    }

    current.items.set(rating.itemId, rating.value);
  }

  if (current) {
    yield { userId: current.userId, ratings: current.items };
  }
}
