import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  MAX_GOALS_LIMIT,
  MarginTargetsSchema,
  MarketOddsSchema,
  PredictMatchInputSchema,
  bookMargin,
  impliedProbability,
  isInvalidArgument,
  marginReport,
  normalize,
  overround,
  predictMatch,
  resolveMarginTargets,
} from "@scoreline/core";
import type { AppConfig } from "./config";
import type { Logger } from "./logger";
import { renderPrediction } from "./render";

// model knobs fall back to server configuration instead of the engine defaults
const MatchPredictInputSchema = PredictMatchInputSchema.extend({
  maxGoals: z.number().int().min(0).max(MAX_GOALS_LIMIT).optional(),
  line: z.number().finite().min(0).optional(),
  topK: z.number().int().min(0).optional(),
  truncation: z.enum(["discard", "renormalize"]).optional(),
});

const ImpliedInputSchema = z.object({
  odds: z.array(z.number().finite().gt(1)).min(2),
});

const MarginsInputSchema = z.object({
  odds: MarketOddsSchema,
  marginTargets: MarginTargetsSchema.optional(),
  line: z.number().finite().min(0).optional(),
});

const r4 = (n: number) => Math.round(n * 10000) / 10000;

function jsonContent(data: unknown) {
  return { type: "text" as const, text: JSON.stringify(data, null, 2) };
}

/**
 * Runs one tool body. Out-of-domain input becomes an error result the client
 * can show; anything else is a bug and propagates.
 */
export function runTool(logger: Logger, name: string, body: () => CallToolResult): CallToolResult {
  try {
    const result = body();
    logger.debug(`${name} ok`);
    return result;
  } catch (err) {
    if (isInvalidArgument(err)) {
      logger.warn(`${name} rejected input`, { argument: err.argument, message: err.message });
      return { content: [{ type: "text", text: err.message }], isError: true };
    }
    logger.error(`${name} failed`, { error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
}

export function createServer(config: AppConfig, logger: Logger) {
  const server = new McpServer({
    name: "scoreline-mcp",
    version: "0.1.0",
  });

  server.tool(
    "match.predict",
    "Poisson scoreline model for a match from two expected-goal rates, with market odds and margin analysis.",
    { input: MatchPredictInputSchema },
    async ({ input }) =>
      runTool(logger, "match.predict", () => {
        const prediction = predictMatch({
          ...input,
          maxGoals: input.maxGoals ?? config.maxGoals,
          line: input.line ?? config.line,
          topK: input.topK ?? config.topK,
          truncation: input.truncation ?? config.truncation,
        });
        return {
          content: [{ type: "text", text: renderPrediction(prediction) }, jsonContent(prediction)],
        };
      })
  );

  server.tool(
    "odds.implied",
    "Implied probabilities of a set of mutually exclusive decimal odds, with the overround removed.",
    { input: ImpliedInputSchema },
    async ({ input }) =>
      runTool(logger, "odds.implied", () => {
        const implied = input.odds.map(impliedProbability);
        return {
          content: [
            jsonContent({
              odds: input.odds,
              implied: implied.map(r4),
              normalized: normalize(implied).map(r4),
              overround: r4(overround(input.odds)),
              bookMargin: r4(bookMargin(input.odds)),
            }),
          ],
        };
      })
  );

  server.tool(
    "odds.margins",
    "Margin differences (target minus quoted odds) for 1X2 and over/under prices.",
    { input: MarginsInputSchema },
    async ({ input }) =>
      runTool(logger, "odds.margins", () => {
        const targets = resolveMarginTargets(input.marginTargets);
        const line = input.line ?? config.line;
        return {
          content: [jsonContent({ targets, differences: marginReport(input.odds, targets, line) })],
        };
      })
  );

  return server;
}
