/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into an AnalysisConfig
 * or a structured error. Uses only Node.js built-ins — no external
 * argument-parsing libraries.
 *
 * Dependencies: Types layer only.
 */

import type { OutputFormat, AnalysisConfig } from "../types/config.js";
import { DEFAULT_PRECISION } from "../types/config.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help request, version request, or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: AnalysisConfig }
  | { readonly ok: false; readonly error: ParseError };

const VALID_FORMATS: ReadonlyMap<string, OutputFormat> = new Map([
  ["terminal", "terminal"],
  ["json", "json"],
]);

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  "--format",
  "--output",
  "--precision",
  "--quiet",
  "--help",
  "--version",
  "--mcp",
]);

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-f", "--format"],
  ["-o", "--output"],
  ["-p", "--precision"],
  ["-q", "--quiet"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

/** Largest precision Number.prototype.toPrecision can honor meaningfully for doubles. */
const MAX_PRECISION = 17;

/**
 * Parse a CLI argument array into an AnalysisConfig.
 *
 * Expected usage:
 *   chargestat [options] [file...]
 *
 * With no files the config has an empty filePaths list and the caller
 * prompts for them.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // Arguments after "--" are file paths, never flags.
  const separator = expandedArgv.indexOf("--");
  const optionArgv = separator === -1 ? expandedArgv : expandedArgv.slice(0, separator);

  if (optionArgv.includes("--help")) {
    return {
      ok: false,
      error: { kind: "help", message: helpText() },
    };
  }

  if (optionArgv.includes("--version")) {
    return {
      ok: false,
      error: { kind: "version", message: `chargestat ${VERSION}` },
    };
  }

  if (optionArgv.includes("--mcp")) {
    return {
      ok: false,
      error: { kind: "mcp", message: "Starting MCP server" },
    };
  }

  let format: OutputFormat = "terminal";
  let formatExplicit = false;
  let outputPath: string | undefined;
  let precision = DEFAULT_PRECISION;
  let quiet = false;
  const filePaths: string[] = [];
  let onlyPositionals = false;

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i] ?? "";
    const originalArg = argv[i] ?? arg;

    if (onlyPositionals) {
      filePaths.push(originalArg);
      i += 1;
      continue;
    }

    if (arg === "--") {
      onlyPositionals = true;
      i += 1;
      continue;
    }

    if (arg === "--format") {
      const value = argv[i + 1];
      if (value === undefined) {
        return {
          ok: false,
          error: { kind: "error", message: `${originalArg} requires a value` },
        };
      }
      const parsed = VALID_FORMATS.get(value);
      if (parsed === undefined) {
        return {
          ok: false,
          error: {
            kind: "error",
            message: `Unknown format "${value}". Valid formats: ${[...VALID_FORMATS.keys()].join(", ")}`,
          },
        };
      }
      format = parsed;
      formatExplicit = true;
      i += 2;
      continue;
    }

    if (arg === "--output") {
      const value = argv[i + 1];
      if (value === undefined) {
        return {
          ok: false,
          error: { kind: "error", message: `${originalArg} requires a value` },
        };
      }
      outputPath = value;
      i += 2;
      continue;
    }

    if (arg === "--precision") {
      const value = argv[i + 1];
      if (value === undefined) {
        return {
          ok: false,
          error: { kind: "error", message: `${originalArg} requires a value` },
        };
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_PRECISION) {
        return {
          ok: false,
          error: {
            kind: "error",
            message: `--precision requires an integer from 1 to ${MAX_PRECISION}, got "${value}"`,
          },
        };
      }
      precision = parsed;
      i += 2;
      continue;
    }

    if (arg === "--quiet") {
      quiet = true;
      i += 1;
      continue;
    }

    if (arg.startsWith("-") && arg !== "-") {
      if (!KNOWN_FLAGS.has(arg)) {
        return {
          ok: false,
          error: {
            kind: "error",
            message: `Unknown flag "${originalArg}"`,
          },
        };
      }
      i += 1;
      continue;
    }

    // Positional argument: a data file. Order and duplicates are kept.
    filePaths.push(originalArg);
    i += 1;
  }

  // Infer output format from --output file extension when --format was not explicit.
  if (!formatExplicit && outputPath !== undefined && outputPath.toLowerCase().endsWith(".json")) {
    format = "json";
  }

  const config: AnalysisConfig = {
    filePaths,
    outputFormat: format,
    outputPath,
    precision,
    quiet,
  };

  return { ok: true, value: config };
}

function helpText(): string {
  return [
    "Usage: chargestat [options] [file...]",
    "",
    "Compute the mean, standard deviation and standard error of the mean",
    "of charge measurements, one value per line. Lines that are blank,",
    "negative, or not a single number are skipped.",
    "",
    "With no files, chargestat asks for them interactively.",
    "",
    "Options:",
    "  -f, --format <format>   Output format (terminal, json)",
    "  -o, --output <path>     Write output to file instead of stdout",
    "                          (format is inferred from a .json extension if --format is omitted)",
    `  -p, --precision <n>     Significant digits in terminal output (1-${MAX_PRECISION}, default ${DEFAULT_PRECISION})`,
    "  -q, --quiet             Do not report skipped data points",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
  ].join("\n");
}
