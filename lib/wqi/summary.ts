// lib/wqi/summary.ts

import { BATHING_CRITERIA as C } from "./constants";
import type { ParameterReading, WQIResult } from "./types";

export function doLabel(mgPerL: number): string {
  if (mgPerL >= C.doWellOxygenated) return "Well Oxygenated";
  if (mgPerL >= C.doMin) return "Adequate";
  if (mgPerL >= C.doDepleted) return "Low (Stressful for Aquatic Life)";
  return "Depleted (Hypoxic)";
}

export function bodLabel(mgPerL: number): string {
  if (mgPerL <= C.bodMax) return "Low Organic Load";
  if (mgPerL <= C.bodHigh) return "Moderate Organic Load";
  return "High Organic Load";
}

export function fcLabel(mpn: number): string {
  if (mpn <= C.fcDesirable) return "Within Bathing Limit";
  if (mpn <= C.fcPermissible) return "Above Desirable Limit";
  return "Sewage Contamination";
}

export function phLabel(ph: number): string {
  if (ph < C.phMin) return "Acidic";
  if (ph > C.phMax) return "Alkaline";
  return "Neutral";
}

export interface ParameterLabels {
  ph: string;
  bod: string;
  dissolvedOxygen: string;
  fecalColiform: string;
}

export function parameterLabels(reading: ParameterReading): ParameterLabels {
  return {
    ph: phLabel(reading.ph),
    bod: bodLabel(reading.bod),
    dissolvedOxygen: doLabel(reading.dissolvedOxygen),
    fecalColiform: fcLabel(reading.fecalColiform),
  };
}

export function summarizeWQI(result: WQIResult): string {
  const { dissolvedOxygen, bod, fecalColiform, ph } = result.reading;

  const parts: string[] = [`${result.classification} (${result.status})`];

  // ---- DO ----
  if (dissolvedOxygen < C.doDepleted) parts.push("Dissolved oxygen depleted");
  else if (dissolvedOxygen < C.doMin) parts.push("Dissolved oxygen low");

  // ---- BOD ----
  if (bod > C.bodHigh) parts.push("BOD high (heavy organic load)");
  else if (bod > C.bodMax) parts.push("BOD elevated");

  // ---- Fecal coliform ----
  if (fecalColiform > C.fcPermissible) parts.push("Fecal coliform high (sewage contamination)");
  else if (fecalColiform > C.fcDesirable) parts.push("Fecal coliform above desirable limit");

  // ---- pH ----
  if (ph < C.phMin) parts.push("pH acidic");
  else if (ph > C.phMax) parts.push("pH alkaline");

  if (parts.length === 1) {
    return `${parts[0]}; meets outdoor bathing criteria.`;
  }

  return parts.join("; ") + ".";
}
