import { InvalidArgumentError } from "../errors";

/** 1/odds, not renormalized until grouped with competing outcomes. */
export function impliedProbability(odds: number) {
  if (!Number.isFinite(odds) || odds <= 0) {
    throw new InvalidArgumentError(`odds must be a positive finite number, got ${odds}`, "odds");
  }
  return 1 / odds;
}

/**
 * pi' = pi / Σpk for a set of mutually exclusive outcomes. Removes the
 * bookmaker's overround.
 */
export function normalize(probabilities: readonly number[]): number[] {
  for (const p of probabilities) {
    if (!Number.isFinite(p) || p < 0) {
      throw new InvalidArgumentError(`probabilities must be non-negative finite numbers, got ${p}`, "probabilities");
    }
  }
  // scale by the largest term first so huge inputs cannot overflow the sum
  const max = Math.max(0, ...probabilities);
  if (max === 0) {
    throw new InvalidArgumentError("cannot normalize probabilities that sum to 0", "probabilities");
  }
  const scaled = probabilities.map((p) => p / max);
  const sum = scaled.reduce((a, b) => a + b, 0);
  return scaled.map((p) => p / sum);
}

export function normalizeTriplet(p1: number, p2: number, p3: number): [number, number, number] {
  const [a, b, c] = normalize([p1, p2, p3]);
  return [a, b, c];
}

export function impliedFromOdds(odds: readonly number[]) {
  // implied p = 1/odds, then normalize to remove overround
  return normalize(odds.map(impliedProbability));
}

/** Σ(1/odds) − 1: how far the book's implied probabilities exceed 1. */
export function overround(odds: readonly number[]) {
  if (odds.length === 0) {
    throw new InvalidArgumentError("overround needs at least one price", "odds");
  }
  return odds.reduce((acc, o) => acc + impliedProbability(o), 0) - 1;
}
