import { describe, expect, it } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  it("drops messages below the level", () => {
    const lines: string[] = [];
    const logger = createLogger("warn", (line) => lines.push(line));
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d", { code: 1 });
    expect(lines).toEqual(["[scoreline] warn c", '[scoreline] error d {"code":1}']);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createLogger("silent", (line) => lines.push(line));
    logger.error("x");
    expect(lines).toEqual([]);
  });
});
