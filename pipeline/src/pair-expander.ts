import type { PairContribution, UserProfile } from "./types.js";

export function countPairs(itemCount: number): number {
  return itemCount < 2 ? 0 : (itemCount * (itemCount - 1)) / 2;
}

// Fan-out is quadratic in the user's rating count; there is no per-user cap.
export function* expandPairs(
  profile: UserProfile,
): Generator<PairContribution> {
  const entries = [...profile.ratings.entries()].sort(
    (left, right) => left[0] - right[0],
  );

  for (let i = 0; i < entries.length; i += 1) {
    const [itemA, valueA] = entries[i];
    for (let j = i + 1; j < entries.length; j += 1) {
      const [itemB, valueB] = entries[j];
      yield { itemA, itemB, valueA, valueB };
    }
  }
}
