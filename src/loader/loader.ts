/**
 * Charge file loader.
 *
 * Reads one file in a single call, splits it into lines and keeps the
 * values that pass parseChargeLine, in file order. A file that cannot be
 * read is a LoadError; deciding what that means for the rest of the batch
 * is left to the caller.
 */

import type { MeasurementSet, RejectedLine } from "../types/measurement.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { parseChargeLine } from "./line-parser.js";

/**
 * Reads a whole file as text. Rejects when the file cannot be opened.
 */
export type ReadFn = (path: string) => Promise<string>;

/**
 * Error returned when a charge file cannot be read.
 */
export interface LoadError {
  readonly kind: "unreadable";
  readonly filePath: string;
  readonly message: string;
  readonly cause?: unknown;
}

export interface LoadOptions {
  /** Called once per rejected line, as soon as the line is classified. */
  readonly onRejected?: (filePath: string, line: RejectedLine) => void;
}

/**
 * Split file contents into lines. A trailing newline does not start an
 * extra line, so "1\n2\n" has two lines and "" has none.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Build a MeasurementSet from file contents already in memory.
 */
export function parseChargeText(
  filePath: string,
  text: string,
  options?: LoadOptions,
): MeasurementSet {
  const lines = splitLines(text);
  const values: number[] = [];
  const rejected: RejectedLine[] = [];

  lines.forEach((raw, index) => {
    const verdict = parseChargeLine(raw);
    if (verdict.accepted) {
      values.push(verdict.value);
      return;
    }
    const line: RejectedLine = { lineNumber: index + 1, raw, reason: verdict.reason };
    rejected.push(line);
    options?.onRejected?.(filePath, line);
  });

  return {
    filePath,
    values,
    validCount: values.length,
    lineCount: lines.length,
    rejected,
  };
}

/**
 * Load and validate a charge data file.
 */
export async function loadChargeFile(
  filePath: string,
  readFn: ReadFn,
  options?: LoadOptions,
): Promise<Result<MeasurementSet, LoadError>> {
  let text: string;
  try {
    text = await readFn(filePath);
  } catch (cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return err({
      kind: "unreadable",
      filePath,
      message: `Could not open file: ${filePath} (${detail})`,
      cause,
    });
  }
  return ok(parseChargeText(filePath, text, options));
}
