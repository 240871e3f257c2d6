#!/usr/bin/env node

/**
 * chargestat CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, readline) and delegates to the runner.
 */

import * as node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../mcp/server.js";
import { readTextFile, writeTextFile } from "./file-io.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";
import { createReadlinePrompter } from "./readline-prompter.js";
import { parseArgs } from "./parse-args.js";

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  readFn: readTextFile,
  writeFn: writeTextFile,
  createPrompter: () => createReadlinePrompter(node_process.stdin, node_process.stdout),
  startMcpServer: async () => {
    const server = createMcpServer({ readFn: readTextFile });
    const transport = new StdioServerTransport();
    await server.connect(transport);
  },
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);
const parsed = parseArgs(argv);
const startsMcpServer = !parsed.ok && parsed.error.kind === "mcp";

run(argv, deps).then((code) => {
  // The MCP server keeps running on stdio until the client disconnects.
  if (!startsMcpServer) {
    // eslint-disable-next-line no-process-exit
    node_process.exit(code);
  }
}, (cause: unknown) => {
  const message = cause instanceof Error ? cause.message : String(cause);
  node_process.stderr.write(`Unexpected error: ${message}\n`);
  node_process.exit(1);
});
