/**
 * Tests for the MCP server module.
 *
 * The server registers an "analyze" tool that runs the analysis pipeline
 * and returns the JSON report. File contents come from an injected
 * readFn.
 */

import { describe, it, expect } from "vitest";
import {
  createMcpServer,
  handleAnalyzeCall,
  type McpServerDeps,
} from "./server.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeDeps(overrides?: Partial<McpServerDeps>): McpServerDeps {
  const files: Record<string, string> = {
    "/data/run1.dat": "1\n2\n3\n",
    "/data/run2.dat": "2\n2\nbad\n",
  };
  return {
    readFn: async (path: string) => {
      const content = files[path];
      if (content === undefined) {
        throw new Error("ENOENT");
      }
      return content;
    },
    timestampFn: () => "2025-01-01T00:00:00.000Z",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// createMcpServer
// ---------------------------------------------------------------------------

describe("createMcpServer", () => {
  it("creates an McpServer instance", () => {
    const server = createMcpServer(makeDeps());
    expect(server).toBeDefined();
    expect(server.server).toBeDefined();
  });
});

// ---------------------------------------------------------------------------
// handleAnalyzeCall — the core tool handler logic
// ---------------------------------------------------------------------------

describe("handleAnalyzeCall", () => {
  it("returns the JSON report as text content", async () => {
    const result = await handleAnalyzeCall({ filePaths: ["/data/run1.dat"] }, makeDeps());

    expect(result.isError).toBeUndefined();
    expect(result.content).toHaveLength(1);
    expect(result.content[0]?.type).toBe("text");
    const report = JSON.parse(result.content[0]?.text ?? "");
    expect(report.timestamp).toBe("2025-01-01T00:00:00.000Z");
    expect(report.unit).toBe("C");
    expect(report.files[0].statistics.mean).toBe(2);
    expect(report.files[0].statistics.standardDeviation).toBe(1);
  });

  it("lists rejected lines in the report", async () => {
    const result = await handleAnalyzeCall({ filePaths: ["/data/run2.dat"] }, makeDeps());

    const report = JSON.parse(result.content[0]?.text ?? "");
    expect(report.files[0].rejected).toEqual([
      { lineNumber: 3, raw: "bad", reason: "not-a-number" },
    ]);
    expect(report.files[0].statistics.standardDeviation).toBe(0);
  });

  it("returns isError when a file cannot be opened", async () => {
    const result = await handleAnalyzeCall(
      { filePaths: ["/data/run1.dat", "/data/missing.dat"] },
      makeDeps(),
    );

    expect(result.isError).toBe(true);
    expect(result.content[0]?.text).toBe("Could not open file: /data/missing.dat (ENOENT)");
  });

  it("uses the current time when no timestampFn is given", async () => {
    const deps: McpServerDeps = { readFn: makeDeps().readFn };
    const result = await handleAnalyzeCall({ filePaths: ["/data/run1.dat"] }, deps);

    const report = JSON.parse(result.content[0]?.text ?? "");
    expect(report.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });
});
