// lib/wqi/batch.ts

import { calculateWQIFromReading } from "./calculate";
import { isInvalidParameterError, type InvalidParameterError } from "./errors";
import type { Classification, ParameterReading, PollutionStatus, WQIResult } from "./types";

export interface StationSample {
  stationId: string;
  timestamp?: string;
  reading: ParameterReading;
}

export type SampleOutcome =
  | { ok: true; stationId: string; timestamp?: string; result: WQIResult }
  | { ok: false; stationId: string; timestamp?: string; reading: ParameterReading; error: InvalidParameterError };

export const STATISTIC_FIELDS = [
  "ph",
  "bod",
  "dissolvedOxygen",
  "fecalColiform",
  "waterTemperature",
] as const;

export type StatisticField = (typeof STATISTIC_FIELDS)[number];

export interface ValueStatistics {
  average: number;
  min: number;
  max: number;
}

export interface BatchSummary {
  total: number;
  computed: number;
  failed: number;
  classificationDistribution: Partial<Record<Classification, number>>;
  statusDistribution: Partial<Record<PollutionStatus, number>>;
  averageWQI: number | null;
  minWQI: number | null;
  maxWQI: number | null;
  // over computed samples only; empty when none were computed
  parameterStatistics: Partial<Record<StatisticField, ValueStatistics>>;
}

/**
 * Scores every sample independently. An invalid reading is reported in
 * its own outcome; the rest of the batch still runs.
 */
export function calculateBatch(samples: readonly StationSample[]): SampleOutcome[] {
  return samples.map(({ stationId, timestamp, reading }): SampleOutcome => {
    try {
      return { ok: true, stationId, timestamp, result: calculateWQIFromReading(reading) };
    } catch (err) {
      if (!isInvalidParameterError(err)) throw err;
      return { ok: false, stationId, timestamp, reading, error: err };
    }
  });
}

export function describeValues(values: readonly number[]): ValueStatistics | null {
  if (values.length === 0) return null;

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }

  return { average: sum / values.length, min, max };
}

export function computedResults(outcomes: readonly SampleOutcome[]): WQIResult[] {
  const results: WQIResult[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) results.push(outcome.result);
  }
  return results;
}

export function summarizeBatch(outcomes: readonly SampleOutcome[]): BatchSummary {
  const classificationDistribution: Partial<Record<Classification, number>> = {};
  const statusDistribution: Partial<Record<PollutionStatus, number>> = {};
  const results = computedResults(outcomes);

  for (const { classification, status } of results) {
    classificationDistribution[classification] =
      (classificationDistribution[classification] ?? 0) + 1;
    statusDistribution[status] = (statusDistribution[status] ?? 0) + 1;
  }

  const parameterStatistics: Partial<Record<StatisticField, ValueStatistics>> = {};
  for (const field of STATISTIC_FIELDS) {
    const stats = describeValues(results.map((r) => r.reading[field]));
    if (stats) parameterStatistics[field] = stats;
  }

  const wqi = describeValues(results.map((r) => r.compositeScore));

  return {
    total: outcomes.length,
    computed: results.length,
    failed: outcomes.length - results.length,
    classificationDistribution,
    statusDistribution,
    averageWQI: wqi?.average ?? null,
    minWQI: wqi?.min ?? null,
    maxWQI: wqi?.max ?? null,
    parameterStatistics,
  };
}
