// lib/wqi/classification.ts

import { WQI_THRESHOLDS } from "./constants";
import type { MpcbClass, WQIBand } from "./types";

function frozenBand(min: number, value: WQIBand): Readonly<{ min: number; band: WQIBand }> {
  return Object.freeze({ min, band: Object.freeze(value) });
}

// Highest band first; the first band whose floor the score reaches wins.
export const WQI_BANDS: ReadonlyArray<Readonly<{ min: number; band: WQIBand }>> = Object.freeze([
  frozenBand(WQI_THRESHOLDS.goodToExcellent, {
    classification: "Good to Excellent",
    cpcbClass: "A",
    status: "Non Polluted",
  }),
  frozenBand(WQI_THRESHOLDS.mediumToGood, {
    classification: "Medium to Good",
    cpcbClass: "B",
    status: "Non Polluted",
  }),
  frozenBand(WQI_THRESHOLDS.bad, {
    classification: "Bad",
    cpcbClass: "C",
    status: "Polluted",
  }),
]);

export const LOWEST_BAND: WQIBand = Object.freeze({
  classification: "Bad to Very Bad",
  cpcbClass: "D/E",
  status: "Heavily Polluted",
});

export function classifyWQI(score: number): WQIBand {
  for (const { min, band } of WQI_BANDS) {
    if (score >= min) return band;
  }
  return LOWEST_BAND;
}

// Maharashtra PCB classes
export function mpcbClass(score: number): MpcbClass {
  if (score >= WQI_THRESHOLDS.goodToExcellent) return "A-I";
  if (score >= WQI_THRESHOLDS.bad) return "A-II";
  if (score >= WQI_THRESHOLDS.veryBad) return "A-III";
  return "A-IV";
}
