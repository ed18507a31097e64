import type { Rating } from "./types.js";

export const DEFAULT_MIN_RATING = 3;

export interface RatingFilterOptions {
  minRating?: number;
}

export function* filterRatings(
  ratings: Iterable<Rating>,
  options: RatingFilterOptions = {},
): Generator<Rating> {
  const minRating = options.minRating ?? DEFAULT_MIN_RATING;
  for (const rating of ratings) {
    if (rating.value >= minRating) {
      yield rating;
    }
  }
}
