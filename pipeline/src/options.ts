export function parseNonNegativeInt(raw: string, field: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid ${field}: ${raw}`);
  }
  return parsed;
}

export function parsePositiveInt(raw: string, field: string): number {
  const parsed = parseNonNegativeInt(raw, field);
  if (parsed < 1) {
    throw new Error(`Invalid ${field}: ${raw}`);
  }
  return parsed;
}

export function parseScoreThreshold(raw: string, field: string): number {
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`Invalid ${field}: ${raw}`);
  }
  return parsed;
}
