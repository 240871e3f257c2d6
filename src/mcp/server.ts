/**
 * MCP server for chargestat.
 *
 * Exposes the analysis pipeline to AI agents via the Model Context
 * Protocol (stdio transport). The "analyze" tool loads the given charge
 * files and returns the report as JSON text.
 *
 * Dependencies: Types, Loader, Orchestration, Formatter (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadFn } from "../loader/loader.js";
import type { AnalyzeOptions } from "../orchestration/orchestrator.js";
import { analyzeFiles } from "../orchestration/orchestrator.js";
import { formatJson } from "../formatter/json.js";
import { VERSION } from "../version.js";

/**
 * Injectable dependencies for the MCP server.
 */
export interface McpServerDeps {
  readonly readFn: ReadFn;
  readonly timestampFn?: () => string;
}

/**
 * The shape returned by the analyze tool handler.
 */
export interface AnalyzeToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

/**
 * Arguments accepted by the analyze tool.
 */
interface AnalyzeArgs {
  readonly filePaths: readonly string[];
}

/**
 * Core logic for the analyze tool call, extracted for testability.
 *
 * An unreadable file fails the whole call, as it does on the CLI.
 * Skipped lines are listed per file in the report instead of being
 * logged.
 */
export async function handleAnalyzeCall(
  args: AnalyzeArgs,
  deps: McpServerDeps,
): Promise<AnalyzeToolResult> {
  const options: AnalyzeOptions = deps.timestampFn !== undefined
    ? { timestampFn: deps.timestampFn }
    : {};

  const result = await analyzeFiles(args.filePaths, deps.readFn, options);

  if (!result.ok) {
    return {
      content: [{ type: "text", text: result.error.message }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: formatJson(result.value) }],
  };
}

/**
 * Create a configured McpServer instance with the "analyze" tool registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: "chargestat",
    version: VERSION,
  });

  server.registerTool(
    "analyze",
    {
      title: "Analyze Charge Measurements",
      description:
        "Load plain-text files of charge measurements (one non-negative number per line) " +
        "and compute the mean, sample standard deviation and standard error of the mean " +
        "for each file. Invalid lines are skipped and listed in the report.",
      inputSchema: {
        filePaths: z
          .array(z.string().min(1))
          .min(1)
          .describe("Paths of the data files to analyze, in order"),
      },
    },
    async (args) => {
      const result = await handleAnalyzeCall({ filePaths: args.filePaths }, deps);
      return result.isError === true
        ? { content: result.content, isError: true }
        : { content: result.content };
    },
  );

  return server;
}
