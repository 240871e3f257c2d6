/**
 * Descriptive statistics over a measurement set.
 *
 * Pure functions only. Each returns an InsufficientDataError instead of a
 * NaN or Infinity when it is given too few values.
 */

import type { ChargeStatistics } from "../types/measurement.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

/**
 * Returned when a statistic is requested over too few values.
 */
export interface InsufficientDataError {
  readonly kind: "insufficient-data";
  /** How many values were supplied. */
  readonly count: number;
  /** How many values the statistic needs. */
  readonly required: number;
  readonly message: string;
}

/** Smallest set computeStatistics accepts (the sample standard deviation needs two). */
export const MIN_VALUES_FOR_STATISTICS = 2;

function insufficientData(count: number, required: number): InsufficientDataError {
  const noun = count === 1 ? "value" : "values";
  return {
    kind: "insufficient-data",
    count,
    required,
    message: `insufficient data: ${count} accepted ${noun}, at least ${required} required`,
  };
}

export function mean(data: readonly number[]): Result<number, InsufficientDataError> {
  if (data.length === 0) {
    return err(insufficientData(0, 1));
  }
  let total = 0;
  for (const x of data) {
    total += x;
  }
  return ok(total / data.length);
}

/**
 * Sample standard deviation with Bessel's correction (divisor n - 1).
 */
export function standardDeviation(
  data: readonly number[],
  dataMean: number,
): Result<number, InsufficientDataError> {
  if (data.length < 2) {
    return err(insufficientData(data.length, 2));
  }
  let total = 0;
  for (const x of data) {
    total += (x - dataMean) ** 2;
  }
  return ok(Math.sqrt(total / (data.length - 1)));
}

/**
 * Standard error of the mean, computed as mean / sqrt(n).
 *
 * The conventional definition divides the standard deviation, not the
 * mean, by sqrt(n).
 */
export function standardErrorOfMean(
  dataMean: number,
  count: number,
): Result<number, InsufficientDataError> {
  if (count < 1) {
    return err(insufficientData(count, 1));
  }
  return ok(dataMean / Math.sqrt(count));
}

/**
 * Compute mean, standard deviation and standard error in one pass over
 * the results of the individual functions.
 */
export function computeStatistics(
  data: readonly number[],
): Result<ChargeStatistics, InsufficientDataError> {
  if (data.length < MIN_VALUES_FOR_STATISTICS) {
    return err(insufficientData(data.length, MIN_VALUES_FOR_STATISTICS));
  }

  const meanResult = mean(data);
  if (!meanResult.ok) return meanResult;

  const sdResult = standardDeviation(data, meanResult.value);
  if (!sdResult.ok) return sdResult;

  const semResult = standardErrorOfMean(meanResult.value, data.length);
  if (!semResult.ok) return semResult;

  return ok({
    count: data.length,
    mean: meanResult.value,
    standardDeviation: sdResult.value,
    standardErrorOfMean: semResult.value,
  });
}
