import { InvalidArgumentError, assertGoalCount } from "../errors";
import { poissonDistribution } from "./poisson";

export const DEFAULT_MAX_GOALS = 5;
export const DEFAULT_LINE = 2.5;

export type ScoreCell = {
  homeGoals: number;
  awayGoals: number;
  probability: number;
};

/**
 * "discard" keeps the raw product so the matrix sums to slightly less than 1
 * (mass beyond maxGoals is dropped). "renormalize" divides every cell by that
 * truncated mass.
 */
export type TruncationPolicy = "discard" | "renormalize";

export type ScoreMatrix = {
  maxGoals: number;
  truncation: TruncationPolicy;
  // home goals ascending, then away goals ascending
  cells: ScoreCell[];
  mass: number;
};

export type MatchOutcome = { home: number; draw: number; away: number };
export type OverUnder = { line: number; over: number; under: number; push: number };
export type BothTeamsToScore = { yes: number; no: number };
export type DoubleChance = { "1X": number; "12": number; X2: number };

/**
 * Independent Poisson joint model. Each side's pmf is evaluated once
 * (O(maxGoals)), then combined cell by cell (O(maxGoals²)).
 */
export function buildScoreMatrix(
  homeMean: number,
  awayMean: number,
  maxGoals = DEFAULT_MAX_GOALS,
  truncation: TruncationPolicy = "discard"
): ScoreMatrix {
  assertGoalCount(maxGoals, "maxGoals");

  const pHome = poissonDistribution(homeMean, maxGoals);
  const pAway = poissonDistribution(awayMean, maxGoals);

  const cells: ScoreCell[] = [];
  let mass = 0;
  for (let hg = 0; hg <= maxGoals; hg++) {
    for (let ag = 0; ag <= maxGoals; ag++) {
      const p = pHome[hg] * pAway[ag];
      cells.push({ homeGoals: hg, awayGoals: ag, probability: p });
      mass += p;
    }
  }

  if (truncation === "renormalize") {
    assertPositiveMass(mass);
    const scaled = cells.map((c) => ({ ...c, probability: c.probability / mass }));
    return { maxGoals, truncation, cells: scaled, mass: sumCells(scaled) };
  }

  return { maxGoals, truncation, cells, mass };
}

// every cell underflows to 0 for extreme rates; there is nothing to scale
function assertPositiveMass(mass: number) {
  if (!Number.isFinite(mass) || mass <= 0) {
    throw new InvalidArgumentError(`score matrix has no probability mass to normalize (mass ${mass})`, "mass");
  }
}

function sumCells(cells: ScoreCell[]) {
  return cells.reduce((acc, c) => acc + c.probability, 0);
}

export function sumWhere(matrix: ScoreMatrix, predicate: (homeGoals: number, awayGoals: number) => boolean) {
  let total = 0;
  for (const c of matrix.cells) {
    if (predicate(c.homeGoals, c.awayGoals)) total += c.probability;
  }
  return total;
}

export function cellProbability(matrix: ScoreMatrix, homeGoals: number, awayGoals: number) {
  const size = matrix.maxGoals + 1;
  if (!Number.isInteger(homeGoals) || !Number.isInteger(awayGoals)) return 0;
  if (homeGoals < 0 || awayGoals < 0 || homeGoals >= size || awayGoals >= size) return 0;
  return matrix.cells[homeGoals * size + awayGoals].probability;
}

export function matchOutcome(matrix: ScoreMatrix): MatchOutcome {
  return {
    home: sumWhere(matrix, (hg, ag) => hg > ag),
    draw: sumWhere(matrix, (hg, ag) => hg === ag),
    away: sumWhere(matrix, (hg, ag) => hg < ag),
  };
}

/**
 * Totals strictly above the line are "over", strictly below are "under".
 * An integral line also yields a push (i+j == line), so over is i+j > floor(line).
 */
export function overUnder(matrix: ScoreMatrix, line = DEFAULT_LINE): OverUnder {
  if (!Number.isFinite(line) || line < 0) {
    throw new InvalidArgumentError(`line must be a non-negative finite number, got ${line}`, "line");
  }
  return {
    line,
    over: sumWhere(matrix, (hg, ag) => hg + ag > line),
    under: sumWhere(matrix, (hg, ag) => hg + ag < line),
    push: sumWhere(matrix, (hg, ag) => hg + ag === line),
  };
}

export function bothTeamsToScore(matrix: ScoreMatrix): BothTeamsToScore {
  const yes = sumWhere(matrix, (hg, ag) => hg >= 1 && ag >= 1);
  return { yes, no: matrix.mass - yes };
}

export function doubleChance(matrix: ScoreMatrix): DoubleChance {
  const { home, draw, away } = matchOutcome(matrix);
  return { "1X": home + draw, "12": home + away, X2: draw + away };
}

/** Probability of each total goal count, index = total. */
export function exactGoals(matrix: ScoreMatrix): number[] {
  const totals = Array.from({ length: 2 * matrix.maxGoals + 1 }, () => 0);
  for (const c of matrix.cells) totals[c.homeGoals + c.awayGoals] += c.probability;
  return totals;
}

/** grid[home][away], scaled to sum to 1 for display. */
export function heatmap(matrix: ScoreMatrix): number[][] {
  assertPositiveMass(matrix.mass);
  const size = matrix.maxGoals + 1;
  const grid = Array.from({ length: size }, () => Array.from({ length: size }, () => 0));
  for (const c of matrix.cells) grid[c.homeGoals][c.awayGoals] = c.probability / matrix.mass;
  return grid;
}
