/**
 * CLI runner — the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into an AnalysisConfig
 *   2. Collect file names interactively when none were given
 *   3. Call the orchestrator, reporting skipped lines on stderr
 *   4. Format the report and write it to stdout or a file
 *
 * Dependencies: All layers (Types, Loader, Orchestration, Formatter).
 */

import type { AnalysisConfig, OutputFormat } from "../types/config.js";
import type { RejectedLine } from "../types/measurement.js";
import type { Formatter, FormatterOptions } from "../formatter/formatter.js";
import type { ReadFn } from "../loader/loader.js";
import type { AnalyzeOptions } from "../orchestration/orchestrator.js";
import type { Prompter } from "./prompt.js";
import { analyzeFiles } from "../orchestration/orchestrator.js";
import { describeRejection } from "../loader/line-parser.js";
import { formatJson } from "../formatter/json.js";
import { formatTerminal } from "../formatter/terminal.js";
import { parseArgs } from "./parse-args.js";
import { promptForFiles, waitForAcknowledgment } from "./prompt.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide mocks.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readFn: ReadFn;
  readonly timestampFn?: () => string;
  readonly writeFn?: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
  /** Opens the interactive channel; only called when no files were given. */
  readonly createPrompter?: () => Prompter;
}

export const WELCOME_MESSAGE = "Welcome to chargestat, the charge measurement calculator!";

function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "terminal":
      return formatTerminal;
  }
}

/**
 * The diagnostic printed for each skipped line.
 */
export function rejectionMessage(filePath: string, line: RejectedLine): string {
  return `File: ${filePath} has a corrupt data point on line ${line.lineNumber} ` +
    `(${describeRejection(line.reason)}): ${JSON.stringify(line.raw)}. Skipping that data point.`;
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = success, 1 = error).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version") {
      deps.stdout(message);
      return 0;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return 1;
      }
      await deps.startMcpServer();
      return 0;
    }
    // Parsing error.
    deps.stderr(message);
    return 1;
  }

  const config = parseResult.value;

  if (config.filePaths.length > 0) {
    return analyzeAndReport(config.filePaths, config, deps);
  }

  if (deps.createPrompter === undefined) {
    deps.stderr("No input files given. Usage: chargestat [options] [file...]");
    return 1;
  }

  const prompter = deps.createPrompter();
  try {
    deps.stdout(WELCOME_MESSAGE);
    const filePaths = await promptForFiles(prompter);
    if (filePaths.length === 0) {
      deps.stderr("No input files given");
      return 1;
    }
    const code = await analyzeAndReport(filePaths, config, deps);
    if (code === 0) {
      await waitForAcknowledgment(prompter);
    }
    return code;
  } finally {
    prompter.close();
  }
}

async function analyzeAndReport(
  filePaths: readonly string[],
  config: AnalysisConfig,
  deps: CliDeps,
): Promise<number> {
  const options: AnalyzeOptions = {
    ...(deps.timestampFn !== undefined ? { timestampFn: deps.timestampFn } : {}),
    ...(config.quiet
      ? {}
      : { onRejected: (filePath: string, line: RejectedLine) => deps.stderr(rejectionMessage(filePath, line)) }),
  };

  const result = await analyzeFiles(filePaths, deps.readFn, options);

  if (!result.ok) {
    deps.stderr(result.error.message);
    deps.stderr("Exiting...");
    return 1;
  }

  const formatter = selectFormatter(config.outputFormat);
  const formatterOptions: FormatterOptions = { precision: config.precision };
  const output = formatter(result.value, formatterOptions);

  if (config.outputPath !== undefined && deps.writeFn !== undefined) {
    try {
      await deps.writeFn(config.outputPath, output);
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      deps.stderr(`Failed to write report: ${message}`);
      return 1;
    }
    deps.stdout(`Report written to ${config.outputPath}`);
  } else {
    deps.stdout(output);
  }

  return 0;
}
