import { InvalidArgumentError } from "../errors";
import type { ScoreCell, ScoreMatrix } from "./scoreMatrix";

export const DEFAULT_TOP_K = 5;

/**
 * Most likely scorelines, probability descending. Equal probabilities keep
 * canonical order (home goals, then away goals, ascending). k larger than the
 * matrix is capped to its cell count.
 */
export function topScorelines(matrix: ScoreMatrix, k = DEFAULT_TOP_K): ScoreCell[] {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidArgumentError(`k must be a non-negative integer, got ${k}`, "k");
  }

  const ranked = matrix.cells
    .map((cell, index) => ({ cell, index }))
    .sort((a, b) => b.cell.probability - a.cell.probability || a.index - b.index);

  return ranked.slice(0, Math.min(k, ranked.length)).map((r) => ({ ...r.cell }));
}
