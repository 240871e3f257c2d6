/**
 * Single-line classifier for charge data files.
 *
 * A line is accepted only when, after trimming, it is exactly one decimal
 * number that is finite and not negative. Everything else is rejected with
 * a reason so the caller can report it.
 */

import type { RejectionReason } from "../types/measurement.js";

export type LineVerdict =
  | { readonly accepted: true; readonly value: number }
  | { readonly accepted: false; readonly reason: RejectionReason };

/** Optional sign, digits with optional fraction (or a bare fraction), optional exponent. */
const NUMERIC_TOKEN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * Classify one raw line from a charge data file.
 *
 * Examples:
 *   "12.5"      -> accepted 12.5
 *   "   7.0   " -> accepted 7
 *   "-3.2"      -> negative
 *   "12.5 foo"  -> trailing-content
 *   "abc"       -> not-a-number
 *   ""          -> blank
 */
export function parseChargeLine(raw: string): LineVerdict {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { accepted: false, reason: "blank" };
  }

  const match = NUMERIC_TOKEN.exec(trimmed);
  if (match === null) {
    return { accepted: false, reason: "not-a-number" };
  }

  const token = match[0] ?? "";
  if (token.length !== trimmed.length) {
    return { accepted: false, reason: "trailing-content" };
  }

  const value = Number(token);
  if (!Number.isFinite(value)) {
    return { accepted: false, reason: "out-of-range" };
  }
  if (value < 0) {
    return { accepted: false, reason: "negative" };
  }

  // Normalizes -0 to 0.
  return { accepted: true, value: value + 0 };
}

/**
 * Human-readable text for a rejection reason, used in diagnostics.
 */
export function describeRejection(reason: RejectionReason): string {
  switch (reason) {
    case "blank":
      return "blank line";
    case "not-a-number":
      return "not a number";
    case "negative":
      return "negative value";
    case "trailing-content":
      return "unexpected content after the number";
    case "out-of-range":
      return "value out of range";
  }
}
