import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors";
import {
  bothTeamsToScore,
  buildScoreMatrix,
  cellProbability,
  doubleChance,
  exactGoals,
  heatmap,
  matchOutcome,
  overUnder,
} from "./scoreMatrix";

const matrix = buildScoreMatrix(1.2, 1.1, 5);

describe("buildScoreMatrix", () => {
  it("covers every scoreline up to maxGoals in canonical order", () => {
    expect(matrix.cells).toHaveLength(36);
    expect(matrix.cells[0]).toMatchObject({ homeGoals: 0, awayGoals: 0 });
    expect(matrix.cells[1]).toMatchObject({ homeGoals: 0, awayGoals: 1 });
    expect(matrix.cells[6]).toMatchObject({ homeGoals: 1, awayGoals: 0 });
    expect(matrix.cells[35]).toMatchObject({ homeGoals: 5, awayGoals: 5 });
  });

  it("multiplies the two marginal distributions", () => {
    expect(cellProbability(matrix, 0, 0)).toBe(Math.exp(-1.2) * Math.exp(-1.1));
    expect(cellProbability(matrix, 0, 0)).toBeCloseTo(0.100259, 6);
    expect(cellProbability(matrix, 1, 1)).toBeCloseTo(0.132342, 6);
  });

  it("keeps cells in [0,1] and drops the truncated mass", () => {
    for (const c of matrix.cells) {
      expect(c.probability).toBeGreaterThanOrEqual(0);
      expect(c.probability).toBeLessThanOrEqual(1);
    }
    expect(matrix.truncation).toBe("discard");
    expect(matrix.mass).toBeLessThan(1);
    expect(matrix.mass).toBeCloseTo(0.997533, 6);
  });

  it("approaches total mass 1 as maxGoals grows", () => {
    const wide = buildScoreMatrix(1.2, 1.1, 10);
    const wider = buildScoreMatrix(1.2, 1.1, 30);
    expect(wide.mass).toBeGreaterThan(matrix.mass);
    expect(Math.abs(wider.mass - 1)).toBeLessThan(1e-9);
  });

  it("rescales cells when asked to renormalize", () => {
    const scaled = buildScoreMatrix(1.2, 1.1, 5, "renormalize");
    expect(scaled.truncation).toBe("renormalize");
    expect(scaled.mass).toBeCloseTo(1, 12);
    expect(cellProbability(scaled, 0, 0)).toBeCloseTo(0.100507, 6);
  });

  it("refuses to renormalize when every cell underflows to 0", () => {
    expect(buildScoreMatrix(800, 1.1, 5).mass).toBe(0);
    expect(() => buildScoreMatrix(800, 1.1, 5, "renormalize")).toThrow(InvalidArgumentError);
  });

  it("builds a single cell when maxGoals is 0", () => {
    const single = buildScoreMatrix(1.2, 1.1, 0);
    expect(single.cells).toEqual([{ homeGoals: 0, awayGoals: 0, probability: Math.exp(-1.2) * Math.exp(-1.1) }]);
  });

  it("rejects a negative or fractional maxGoals", () => {
    expect(() => buildScoreMatrix(1.2, 1.1, -1)).toThrow(InvalidArgumentError);
    expect(() => buildScoreMatrix(1.2, 1.1, 2.5)).toThrow(InvalidArgumentError);
  });

  it("rejects a non-positive rate", () => {
    expect(() => buildScoreMatrix(0, 1.1)).toThrow(InvalidArgumentError);
  });

  it("returns 0 outside the goal domain", () => {
    expect(cellProbability(matrix, 6, 0)).toBe(0);
    expect(cellProbability(matrix, -1, 0)).toBe(0);
  });
});

describe("aggregates", () => {
  it("splits the matrix mass into home, draw and away", () => {
    const { home, draw, away } = matchOutcome(matrix);
    expect(home).toBeCloseTo(0.381573, 5);
    expect(draw).toBeCloseTo(0.283235, 5);
    expect(away).toBeCloseTo(0.332726, 5);
    expect(home + draw + away).toBeCloseTo(matrix.mass, 12);
  });

  it("counts totals either side of a half-goal line", () => {
    const ou = overUnder(matrix, 2.5);
    expect(ou.over).toBeCloseTo(0.401495, 5);
    expect(ou.under).toBeCloseTo(0.596039, 5);
    expect(ou.push).toBe(0);
  });

  it("reports a push on an integral line", () => {
    const ou = overUnder(matrix, 3);
    expect(ou.over).toBeCloseTo(0.198186, 5);
    expect(ou.under).toBeCloseTo(0.596039, 5);
    expect(ou.push).toBeCloseTo(0.203308, 5);
    expect(ou.over + ou.under + ou.push).toBeCloseTo(matrix.mass, 12);
  });

  it("rejects a negative line", () => {
    expect(() => overUnder(matrix, -0.5)).toThrow(InvalidArgumentError);
  });

  it("computes both teams to score against the matrix mass", () => {
    const btts = bothTeamsToScore(matrix);
    expect(btts.yes).toBeCloseTo(0.464518, 5);
    expect(btts.yes + btts.no).toBeCloseTo(matrix.mass, 12);
  });

  it("derives double chance from the outcome sums", () => {
    const outcome = matchOutcome(matrix);
    const dc = doubleChance(matrix);
    expect(dc["1X"]).toBeCloseTo(outcome.home + outcome.draw, 12);
    expect(dc["12"]).toBeCloseTo(outcome.home + outcome.away, 12);
    expect(dc.X2).toBeCloseTo(outcome.draw + outcome.away, 12);
  });

  it("distributes total goals", () => {
    const totals = exactGoals(matrix);
    expect(totals).toHaveLength(11);
    expect(totals[0]).toBe(cellProbability(matrix, 0, 0));
    expect(totals[2]).toBeCloseTo(0.265185, 5);
    expect(totals.reduce((a, b) => a + b, 0)).toBeCloseTo(matrix.mass, 12);
  });

  it("scales the heatmap to 1", () => {
    const grid = heatmap(matrix);
    expect(grid).toHaveLength(6);
    expect(grid[1][1]).toBeCloseTo(0.132669, 6);
    expect(grid.flat().reduce((a, b) => a + b, 0)).toBeCloseTo(1, 12);
  });

  it("refuses a heatmap for a matrix with no mass", () => {
    expect(() => heatmap(buildScoreMatrix(800, 1.1, 5))).toThrow(InvalidArgumentError);
  });
});
