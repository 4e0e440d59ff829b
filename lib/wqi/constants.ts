// lib/wqi/constants.ts
// --------------------------------------------------------
// CPCB Water Quality Index constants
// --------------------------------------------------------
// Weights (modified NSF-WQI, Central Pollution Control Board):
//   - Dissolved Oxygen (31%)
//   - Fecal Coliform   (28%)
//   - pH               (22%)
//   - BOD              (19%)
// Water temperature is recorded with a reading but not scored.
// --------------------------------------------------------

export const WQI_WEIGHTS = Object.freeze({
  dissolvedOxygen: 0.31,
  fecalColiform: 0.28,
  ph: 0.22,
  bod: 0.19,
});

export const WEIGHT_SUM_TOLERANCE = 1e-9;

export function weightSum(): number {
  return (
    WQI_WEIGHTS.dissolvedOxygen +
    WQI_WEIGHTS.fecalColiform +
    WQI_WEIGHTS.ph +
    WQI_WEIGHTS.bod
  );
}

if (Math.abs(weightSum() - 1) > WEIGHT_SUM_TOLERANCE) {
  throw new Error(`WQI weights must sum to 1, got ${weightSum()}`);
}

// mg/L treated as 100% DO saturation
export const DO_SATURATION_MG_L = 6.5;

export const DEFAULT_WATER_TEMPERATURE_C = 25.0;

export const FC_LOG_BREAK = 1_000;
export const FC_FLOOR_BREAK = 100_000;
export const FC_FLOOR_SUB_INDEX = 2.0;

export const BOD_FLOOR_BREAK = 30;
export const BOD_FLOOR_SUB_INDEX = 2.0;

export const SUB_INDEX_MIN = 0;
export const SUB_INDEX_MAX = 100;

// Lower bound of each band; a score on the bound belongs to the band.
export const WQI_THRESHOLDS = Object.freeze({
  goodToExcellent: 63,
  mediumToGood: 50,
  bad: 38,
  // MPCB splits the lowest CPCB band here
  veryBad: 25,
});

// CPCB designated-best-use criteria for outdoor bathing (class B)
export const BATHING_CRITERIA = Object.freeze({
  doWellOxygenated: 6,
  doMin: 5,
  // class C (drinking source after treatment) floor
  doDepleted: 4,
  bodMax: 3,
  bodHigh: 6,
  fcDesirable: 500,
  fcPermissible: 2500,
  phMin: 6.5,
  phMax: 8.5,
});
