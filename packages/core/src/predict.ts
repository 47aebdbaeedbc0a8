import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import { topScorelines, DEFAULT_TOP_K } from "./football/ranker";
import {
  DEFAULT_LINE,
  DEFAULT_MAX_GOALS,
  bothTeamsToScore,
  buildScoreMatrix,
  doubleChance,
  exactGoals,
  heatmap,
  matchOutcome,
  overUnder,
  type DoubleChance,
  type ScoreCell,
  type ScoreMatrix,
  type TruncationPolicy,
} from "./football/scoreMatrix";
import { impliedFromOdds, overround } from "./odds/implied";
import { marginReport, resolveMarginTargets, type MarginTargets } from "./odds/margin";

export const MAX_GOALS_LIMIT = 50;

export const SELECTIONS = [
  "homeWin",
  "draw",
  "awayWin",
  "over",
  "under",
  "correctScore",
  "btts",
  "exactGoals",
] as const;

export type Selection = (typeof SELECTIONS)[number];

const DecimalOddsSchema = z.number().finite().gt(1);

export const MarketOddsSchema = z
  .object({
    home: DecimalOddsSchema.optional(),
    draw: DecimalOddsSchema.optional(),
    away: DecimalOddsSchema.optional(),
    over: DecimalOddsSchema.optional(),
    under: DecimalOddsSchema.optional(),
  })
  .superRefine((odds, ctx) => {
    const threeWay = [odds.home, odds.draw, odds.away].filter((o) => o !== undefined).length;
    if (threeWay !== 0 && threeWay !== 3) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "home, draw and away odds must be given together",
        path: ["home"],
      });
    }
    if ((odds.over === undefined) !== (odds.under === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "over and under odds must be given together",
        path: ["over"],
      });
    }
  });

export const MarginTargetsSchema = z.object({
  matchResults: z.number().finite().optional(),
  asianHandicap: z.number().finite().optional(),
  overUnder: z.number().finite().optional(),
  exactGoals: z.number().finite().optional(),
  correctScore: z.number().finite().optional(),
  htft: z.number().finite().optional(),
});

/**
 * Everything one prediction needs. Pure + deterministic; no API calls.
 */
export const PredictMatchInputSchema = z.object({
  homeTeam: z.string().min(1).default("Home"),
  awayTeam: z.string().min(1).default("Away"),
  homeMean: z.number().finite().positive(),
  awayMean: z.number().finite().positive(),
  maxGoals: z.number().int().min(0).max(MAX_GOALS_LIMIT).default(DEFAULT_MAX_GOALS),
  line: z.number().finite().min(0).default(DEFAULT_LINE),
  topK: z.number().int().min(0).default(DEFAULT_TOP_K),
  truncation: z.enum(["discard", "renormalize"]).default("discard"),
  odds: MarketOddsSchema.optional(),
  marginTargets: MarginTargetsSchema.default({}),
  selection: z.array(z.enum(SELECTIONS)).default([...SELECTIONS]),
});

export type PredictMatchInput = z.input<typeof PredictMatchInputSchema>;

type OutcomeProbabilities = {
  homeWin?: number;
  draw?: number;
  awayWin?: number;
  over?: number;
  under?: number;
};

export type MatchPrediction = {
  homeTeam: string;
  awayTeam: string;
  lambdaHome: number;
  lambdaAway: number;
  line: number;
  truncation: TruncationPolicy;
  matrix: ScoreMatrix;
  // grid[home][away], scaled to sum to 1
  heatmap: number[][];
  model: OutcomeProbabilities & {
    doubleChance?: DoubleChance;
    push?: number;
    btts?: { yes: number; no: number };
    exactGoals?: number[];
  };
  // implied probabilities with the overround removed
  market: OutcomeProbabilities;
  overround: { matchResult?: number; overUnder?: number };
  // model − market
  edges: OutcomeProbabilities;
  topScores: ScoreCell[];
  marginTargets: MarginTargets;
  marginDifferences: Record<string, number>;
};

export function parsePredictMatchInput(input: unknown) {
  const parsed = PredictMatchInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join(".") || "input";
    throw new InvalidArgumentError(`${path}: ${issue?.message ?? "invalid input"}`, path);
  }
  return parsed.data;
}

export function predictMatch(input: PredictMatchInput): MatchPrediction {
  const args = parsePredictMatchInput(input);
  const selected = new Set<Selection>(args.selection);

  const matrix = buildScoreMatrix(args.homeMean, args.awayMean, args.maxGoals, args.truncation);
  const outcome = matchOutcome(matrix);
  const ou = overUnder(matrix, args.line);

  const model: MatchPrediction["model"] = {};
  if (selected.has("homeWin")) model.homeWin = outcome.home;
  if (selected.has("draw")) model.draw = outcome.draw;
  if (selected.has("awayWin")) model.awayWin = outcome.away;
  if (selected.has("homeWin") || selected.has("draw") || selected.has("awayWin")) {
    model.doubleChance = doubleChance(matrix);
  }
  if (selected.has("over")) model.over = ou.over;
  if (selected.has("under")) model.under = ou.under;
  if ((selected.has("over") || selected.has("under")) && ou.push > 0) model.push = ou.push;
  if (selected.has("btts")) model.btts = bothTeamsToScore(matrix);
  if (selected.has("exactGoals")) model.exactGoals = exactGoals(matrix);

  const market: OutcomeProbabilities = {};
  const book: MatchPrediction["overround"] = {};
  const odds = args.odds ?? {};

  if (odds.home !== undefined && odds.draw !== undefined && odds.away !== undefined) {
    const prices = [odds.home, odds.draw, odds.away];
    const [pH, pD, pA] = impliedFromOdds(prices);
    if (selected.has("homeWin")) market.homeWin = pH;
    if (selected.has("draw")) market.draw = pD;
    if (selected.has("awayWin")) market.awayWin = pA;
    book.matchResult = overround(prices);
  }

  if (odds.over !== undefined && odds.under !== undefined) {
    const prices = [odds.over, odds.under];
    const [pO, pU] = impliedFromOdds(prices);
    if (selected.has("over")) market.over = pO;
    if (selected.has("under")) market.under = pU;
    book.overUnder = overround(prices);
  }

  const edges: OutcomeProbabilities = {};
  for (const key of ["homeWin", "draw", "awayWin", "over", "under"] as const) {
    const m = model[key];
    const p = market[key];
    if (m !== undefined && p !== undefined) edges[key] = m - p;
  }

  const marginTargets = resolveMarginTargets(args.marginTargets);

  return {
    homeTeam: args.homeTeam,
    awayTeam: args.awayTeam,
    lambdaHome: args.homeMean,
    lambdaAway: args.awayMean,
    line: args.line,
    truncation: args.truncation,
    matrix,
    heatmap: heatmap(matrix),
    model,
    market,
    overround: book,
    edges,
    topScores: selected.has("correctScore") ? topScorelines(matrix, args.topK) : [],
    marginTargets,
    marginDifferences: marginReport(odds, marginTargets, args.line),
  };
}
