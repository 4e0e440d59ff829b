// lib/wqi/subIndices.ts
// --------------------------------------------------------
// CPCB sub-index curves. Each returns a value in [0, 100].
// --------------------------------------------------------

import {
  BOD_FLOOR_BREAK,
  BOD_FLOOR_SUB_INDEX,
  DO_SATURATION_MG_L,
  FC_FLOOR_BREAK,
  FC_FLOOR_SUB_INDEX,
  FC_LOG_BREAK,
  SUB_INDEX_MAX,
  SUB_INDEX_MIN,
} from "./constants";

export function clampSubIndex(value: number): number {
  return Math.min(SUB_INDEX_MAX, Math.max(SUB_INDEX_MIN, value));
}

export function doSaturationPercent(mgPerL: number): number {
  return (mgPerL / DO_SATURATION_MG_L) * 100;
}

export function doSubIndex(mgPerL: number): number {
  // outside 0-140% the nearest curve is read at its end point
  const p = Math.min(140, Math.max(0, doSaturationPercent(mgPerL)));

  if (p <= 40) return clampSubIndex(0.18 + 0.66 * p);
  if (p <= 100) return clampSubIndex(-13.55 + 1.17 * p);
  return clampSubIndex(163.34 - 0.62 * p);
}

// fc must already be > 0
export function fcSubIndex(mpn: number): number {
  if (mpn <= FC_LOG_BREAK) return clampSubIndex(97.2 - 26.6 * Math.log10(mpn));
  if (mpn <= FC_FLOOR_BREAK) return clampSubIndex(42.33 - 7.75 * Math.log10(mpn));
  return FC_FLOOR_SUB_INDEX;
}

export function phSubIndex(ph: number): number {
  if (ph < 2 || ph > 12) return 0;
  if (ph <= 5) return clampSubIndex(16.1 + 7.35 * ph);
  if (ph <= 7.3) return clampSubIndex(-142.67 + 33.5 * ph);
  if (ph <= 10) return clampSubIndex(316.96 - 29.85 * ph);
  return clampSubIndex(96.17 - 8.0 * ph);
}

export function bodSubIndex(mgPerL: number): number {
  const bod = Math.max(0, mgPerL);

  if (bod <= 10) return clampSubIndex(96.67 - 7.0 * bod);
  if (bod <= BOD_FLOOR_BREAK) return clampSubIndex(38.9 - 1.23 * bod);
  return BOD_FLOOR_SUB_INDEX;
}
