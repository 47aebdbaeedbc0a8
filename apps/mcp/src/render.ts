import type { MatchPrediction } from "@scoreline/core";

const pct = (p: number) => `${(p * 100).toFixed(2)}%`;

function row(label: string, model?: number, market?: number) {
  let line = `  ${label.padEnd(10)} model ${model === undefined ? "-" : pct(model)}`;
  if (market !== undefined) line += `  market ${pct(market)}`;
  return line;
}

/**
 * Plain-text report of a prediction, one section per selected output.
 */
export function renderPrediction(p: MatchPrediction): string {
  const lines: string[] = [];
  lines.push(`${p.homeTeam} vs ${p.awayTeam}`);
  lines.push(
    `Expected goals ${p.lambdaHome.toFixed(2)} - ${p.lambdaAway.toFixed(2)}, ` +
      `scores 0..${p.matrix.maxGoals}, mass ${pct(p.matrix.mass)} (${p.truncation})`
  );

  const { model, market } = p;

  if (model.homeWin !== undefined || model.draw !== undefined || model.awayWin !== undefined) {
    lines.push("", "Match outcome");
    if (model.homeWin !== undefined) lines.push(row("Home Win", model.homeWin, market.homeWin));
    if (model.draw !== undefined) lines.push(row("Draw", model.draw, market.draw));
    if (model.awayWin !== undefined) lines.push(row("Away Win", model.awayWin, market.awayWin));
  }

  if (model.over !== undefined || model.under !== undefined) {
    lines.push("", `Goals ${p.line}`);
    if (model.over !== undefined) lines.push(row("Over", model.over, market.over));
    if (model.under !== undefined) lines.push(row("Under", model.under, market.under));
    if (model.push !== undefined) lines.push(row("Push", model.push));
  }

  if (model.btts) {
    lines.push("", "Both teams to score");
    lines.push(row("Yes", model.btts.yes), row("No", model.btts.no));
  }

  if (model.exactGoals) {
    lines.push("", "Exact goals");
    model.exactGoals.forEach((prob, total) => lines.push(`  ${String(total).padEnd(3)} ${pct(prob)}`));
  }

  if (p.topScores.length > 0) {
    lines.push("", "Top correct scores");
    for (const c of p.topScores) lines.push(`  ${c.homeGoals}-${c.awayGoals}  ${pct(c.probability)}`);
  }

  const margins = Object.entries(p.marginDifferences);
  if (margins.length > 0) {
    lines.push("", "Margin differences");
    for (const [label, diff] of margins) lines.push(`  ${label.padEnd(10)} ${diff.toFixed(2)}`);
  }

  return lines.join("\n");
}
