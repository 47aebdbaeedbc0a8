import { assertFinite } from "../errors";
import { overround } from "./implied";

export const MARGIN_CATEGORIES = [
  "matchResults",
  "asianHandicap",
  "overUnder",
  "exactGoals",
  "correctScore",
  "htft",
] as const;

export type MarginCategory = (typeof MARGIN_CATEGORIES)[number];

export type MarginTargets = Record<MarginCategory, number>;

export const MARGIN_CATEGORY_LABELS: Record<MarginCategory, string> = {
  matchResults: "Match Results",
  asianHandicap: "Asian Handicap",
  overUnder: "Over/Under",
  exactGoals: "Exact Goals",
  correctScore: "Correct Score",
  htft: "HT/FT",
};

// percentage points
export const DEFAULT_MARGIN_TARGETS: MarginTargets = {
  matchResults: 4.95,
  asianHandicap: 5.9,
  overUnder: 6.18,
  exactGoals: 20.0,
  correctScore: 57.97,
  htft: 20.0,
};

export type MarketOdds = {
  home?: number;
  draw?: number;
  away?: number;
  over?: number;
  under?: number;
};

/**
 * Two decimals, ties to even on the exact binary value. A double only sits
 * exactly on a 2-decimal tie when it is an odd multiple of 1/8.
 */
export function round2(x: number) {
  const eighths = x * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths % 2) === 1) {
    const k = Math.floor(x * 100);
    return (k % 2 === 0 ? k : k + 1) / 100;
  }
  return Number(x.toFixed(2));
}

/**
 * target − quotedValue, to 2 decimals. quotedValue is whatever the caller
 * compares for the market (raw odds in the margin table).
 */
export function marginDifference(target: number, quotedValue: number) {
  assertFinite(target, "target");
  assertFinite(quotedValue, "quotedValue");
  return round2(target - quotedValue);
}

export function resolveMarginTargets(overrides: Partial<MarginTargets> = {}): MarginTargets {
  const targets = { ...DEFAULT_MARGIN_TARGETS };
  for (const key of MARGIN_CATEGORIES) {
    const value = overrides[key];
    if (value !== undefined) {
      assertFinite(value, key);
      targets[key] = value;
    }
  }
  return targets;
}

/** Overround in percentage points, comparable to a margin target. */
export function bookMargin(odds: readonly number[]) {
  return overround(odds) * 100;
}

/**
 * Margin differences keyed by selection label. Only supplied odds appear.
 */
export function marginReport(odds: MarketOdds, targets: MarginTargets, line = 2.5): Record<string, number> {
  const rows: Array<[string, number | undefined, MarginCategory]> = [
    ["Home Win", odds.home, "matchResults"],
    ["Draw", odds.draw, "matchResults"],
    ["Away Win", odds.away, "matchResults"],
    [`Over ${line}`, odds.over, "overUnder"],
    [`Under ${line}`, odds.under, "overUnder"],
  ];

  const out: Record<string, number> = {};
  for (const [label, quoted, category] of rows) {
    if (quoted === undefined) continue;
    out[label] = marginDifference(targets[category], quoted);
  }
  return out;
}
