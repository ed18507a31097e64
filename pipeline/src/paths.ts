import path from "node:path";
import { fileURLToPath } from "node:url";

// Scripts live in pipeline/src, two levels below the repository root.
export function getRepoRoot(metaUrl: string): string {
  const thisDir = path.dirname(fileURLToPath(metaUrl));
  return path.resolve(thisDir, "..", "..");
}

export function resolveFromRoot(
  repoRoot: string,
  ...candidates: (string | undefined)[]
): string {
  const selected = candidates.find(
    (candidate): candidate is string =>
      candidate !== undefined && candidate.length > 0,
  );
  if (selected === undefined) {
    throw new Error("No path candidate provided");
  }
  return path.resolve(repoRoot, selected);
}
