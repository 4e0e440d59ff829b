// lib/wqi/calculate.ts

import { DEFAULT_WATER_TEMPERATURE_C, WQI_WEIGHTS } from "./constants";
import { classifyWQI, mpcbClass } from "./classification";
import { bodSubIndex, doSubIndex, fcSubIndex, phSubIndex } from "./subIndices";
import type { ParameterReading, ScoredParameters, WQIResult, WQIResultJson } from "./types";
import { resolveReading, validateParameters } from "./validation";

export function calculateWQIFromReading(reading: ParameterReading): WQIResult {
  const resolved = resolveReading(reading);

  const subIndices: ScoredParameters = Object.freeze({
    ph: phSubIndex(resolved.ph),
    bod: bodSubIndex(resolved.bod),
    dissolvedOxygen: doSubIndex(resolved.dissolvedOxygen),
    fecalColiform: fcSubIndex(resolved.fecalColiform),
  });

  const weightedIndices: ScoredParameters = Object.freeze({
    ph: subIndices.ph * WQI_WEIGHTS.ph,
    bod: subIndices.bod * WQI_WEIGHTS.bod,
    dissolvedOxygen: subIndices.dissolvedOxygen * WQI_WEIGHTS.dissolvedOxygen,
    fecalColiform: subIndices.fecalColiform * WQI_WEIGHTS.fecalColiform,
  });

  // Not clamped; the band thresholds are applied to the raw sum.
  const compositeScore =
    weightedIndices.dissolvedOxygen +
    weightedIndices.fecalColiform +
    weightedIndices.ph +
    weightedIndices.bod;

  const band = classifyWQI(compositeScore);

  return Object.freeze({
    compositeScore,
    subIndices,
    weightedIndices,
    classification: band.classification,
    cpcbClass: band.cpcbClass,
    mpcbClass: mpcbClass(compositeScore),
    status: band.status,
    warnings: Object.freeze(validateParameters(resolved).issues),
    reading: resolved,
  });
}

export function calculateWQI(
  ph: number,
  bod: number,
  dissolvedOxygen: number,
  fecalColiform: number,
  waterTemperature: number = DEFAULT_WATER_TEMPERATURE_C
): WQIResult {
  return calculateWQIFromReading({
    ph,
    bod,
    dissolvedOxygen,
    fecalColiform,
    waterTemperature,
  });
}

export function wqiResultToJson(result: WQIResult): WQIResultJson {
  return {
    wqi: result.compositeScore,
    subIndices: { ...result.subIndices },
    weightedIndices: { ...result.weightedIndices },
    classification: result.classification,
    cpcbClass: result.cpcbClass,
    mpcbClass: result.mpcbClass,
    status: result.status,
    warnings: [...result.warnings],
  };
}

export function formatWQIResult(result: WQIResult): string {
  return `WQI: ${result.compositeScore.toFixed(2)} - ${result.classification} (${result.status})`;
}
