import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { loadConfig } from "./config";
import { createLogger, type Logger } from "./logger";
import { createServer } from "./server";

/**
 * Loads configuration and connects the server. Resolves to the process exit
 * code; startup failures are logged, not thrown.
 */
export async function main(
  env: Record<string, string | undefined>,
  transport: Transport,
  sink?: (line: string) => void
): Promise<number> {
  // until configuration names a level, only errors are written
  let logger: Logger = createLogger("error", sink);
  try {
    const config = loadConfig(env);
    logger = createLogger(config.logLevel, sink);
    await createServer(config, logger).connect(transport);
    logger.info("MCP server running: scoreline-mcp", { maxGoals: config.maxGoals, line: config.line });
    return 0;
  } catch (err) {
    logger.error("failed to start", { error: err instanceof Error ? err.message : String(err) });
    return 1;
  }
}
