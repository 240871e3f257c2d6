/**
 * Production file access for the CLI and the MCP server.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

export async function readTextFile(path: string): Promise<string> {
  return node_fs.readFile(path, "utf-8");
}

/**
 * Write a report, creating parent directories so that
 * `--output deep/nested/report.json` works without setup.
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  const dir = node_path.dirname(path);
  await node_fs.mkdir(dir, { recursive: true });
  await node_fs.writeFile(path, content, "utf-8");
}
