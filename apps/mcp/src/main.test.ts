import { describe, expect, it } from "vitest";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { main } from "./main";

describe("main", () => {
  it("logs a bad environment and returns a failing exit code", async () => {
    const lines: string[] = [];
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const code = await main({ SCORELINE_MAX_GOALS: "-1" }, serverTransport, (line) => lines.push(line));

    expect(code).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[scoreline\] error failed to start \{"error":"Invalid configuration: SCORELINE_MAX_GOALS: /);
    await clientTransport.close();
  });

  it("connects with a valid environment", async () => {
    const lines: string[] = [];
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const code = await main({ LOG_LEVEL: "info", SCORELINE_MAX_GOALS: "6" }, serverTransport, (line) =>
      lines.push(line)
    );

    expect(code).toBe(0);
    expect(lines).toEqual(['[scoreline] info MCP server running: scoreline-mcp {"maxGoals":6,"line":2.5}']);
    await clientTransport.close();
  });
});
