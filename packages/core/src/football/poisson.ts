import { InvalidArgumentError, assertGoalCount } from "../errors";

/**
 * n! by iterative product. Every intermediate value up to 22! is exactly
 * representable as a double, so small goal counts lose nothing.
 */
export function factorial(n: number) {
  assertGoalCount(n, "n");
  let fact = 1;
  for (let i = 2; i <= n; i++) fact *= i;
  return fact;
}

/**
 * P(X=k) = e^-λ * λ^k / k!
 */
export function poissonPmf(mean: number, k: number) {
  if (!Number.isFinite(mean) || mean <= 0) {
    throw new InvalidArgumentError(`mean must be a positive finite number, got ${mean}`, "mean");
  }
  assertGoalCount(k, "k");
  return (Math.exp(-mean) * Math.pow(mean, k)) / factorial(k);
}

/** pmf for every goal count in [0, maxGoals]. */
export function poissonDistribution(mean: number, maxGoals: number): number[] {
  assertGoalCount(maxGoals, "maxGoals");
  const probs: number[] = [];
  for (let k = 0; k <= maxGoals; k++) probs.push(poissonPmf(mean, k));
  return probs;
}
