// lib/wqi/validation.ts

import { DEFAULT_WATER_TEMPERATURE_C } from "./constants";
import { InvalidParameterError, type ParameterName } from "./errors";
import type { ParameterReading, ResolvedReading } from "./types";

export interface ValidationResult {
  isValid: boolean;
  issues: string[];
}

// Realistic field ranges. Readings outside them are still scored.
export const REALISTIC_RANGES = {
  dissolvedOxygen: { min: 0, max: 20, message: "Dissolved Oxygen out of realistic range (0-20 mg/l)" },
  fecalColiform: { min: 0, max: 1_000_000, message: "Fecal Coliform out of realistic range (0-1,000,000 MPN/100ml)" },
  ph: { min: 0, max: 14, message: "pH out of valid range (0-14)" },
  bod: { min: 0, max: 100, message: "BOD out of realistic range (0-100 mg/l)" },
  waterTemperature: { min: 0, max: 50, message: "Water temperature out of realistic range (0-50 °C)" },
} as const;

const RANGE_ORDER = [
  "dissolvedOxygen",
  "fecalColiform",
  "ph",
  "bod",
  "waterTemperature",
] as const;

export function validateParameters(reading: ParameterReading): ValidationResult {
  const issues: string[] = [];
  const values: Record<keyof typeof REALISTIC_RANGES, number> = {
    dissolvedOxygen: reading.dissolvedOxygen,
    fecalColiform: reading.fecalColiform,
    ph: reading.ph,
    bod: reading.bod,
    waterTemperature: reading.waterTemperature ?? DEFAULT_WATER_TEMPERATURE_C,
  };

  for (const key of RANGE_ORDER) {
    const { min, max, message } = REALISTIC_RANGES[key];
    const value = values[key];
    if (!(value >= min && value <= max)) issues.push(message);
  }

  return { isValid: issues.length === 0, issues };
}

function requireFinite(parameter: ParameterName, value: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, value, "must be a finite number");
  }
  return value;
}

/**
 * Checks the engine's hard preconditions and fills in the default
 * temperature. Throws InvalidParameterError on the first failure.
 */
export function resolveReading(reading: ParameterReading): ResolvedReading {
  const resolved = {
    ph: requireFinite("ph", reading.ph),
    bod: requireFinite("bod", reading.bod),
    dissolvedOxygen: requireFinite("dissolvedOxygen", reading.dissolvedOxygen),
    fecalColiform: requireFinite("fecalColiform", reading.fecalColiform),
    waterTemperature: requireFinite(
      "waterTemperature",
      reading.waterTemperature ?? DEFAULT_WATER_TEMPERATURE_C
    ),
  };

  if (resolved.fecalColiform <= 0) {
    throw new InvalidParameterError(
      "fecalColiform",
      resolved.fecalColiform,
      "must be greater than 0 MPN/100mL"
    );
  }

  return Object.freeze(resolved);
}

// ---- Untyped JSON boundary ----

const FIELD_ALIASES: Record<ParameterName, readonly string[]> = {
  ph: ["ph", "pH", "PH"],
  bod: ["bod", "BOD"],
  dissolvedOxygen: ["dissolvedOxygen", "dissolved_oxygen", "DO", "do"],
  fecalColiform: ["fecalColiform", "fecal_coliform", "FC", "fc"],
  waterTemperature: ["waterTemperature", "water_temperature", "temperature"],
};

export function numericOrNull(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

function pickField(data: Record<string, unknown>, field: ParameterName): unknown {
  for (const key of FIELD_ALIASES[field]) {
    if (data[key] !== undefined && data[key] !== null) return data[key];
  }
  return undefined;
}

function requiredNumber(data: Record<string, unknown>, field: ParameterName): number {
  const raw = pickField(data, field);
  if (raw === undefined) {
    throw new InvalidParameterError(field, raw, "is required");
  }
  const value = numericOrNull(raw);
  if (value === null) {
    throw new InvalidParameterError(field, raw, "must be a finite number");
  }
  return value;
}

export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

/**
 * Turns a loose JSON parameter map (camelCase, snake_case or the short
 * DO/FC/BOD keys) into a typed reading.
 */
export function parseParameterReading(raw: unknown): ParameterReading {
  if (!isRecord(raw)) {
    throw new InvalidParameterError("reading", raw, "must be an object");
  }

  const reading: ParameterReading = {
    ph: requiredNumber(raw, "ph"),
    bod: requiredNumber(raw, "bod"),
    dissolvedOxygen: requiredNumber(raw, "dissolvedOxygen"),
    fecalColiform: requiredNumber(raw, "fecalColiform"),
  };

  if (pickField(raw, "waterTemperature") !== undefined) {
    reading.waterTemperature = requiredNumber(raw, "waterTemperature");
  }

  return reading;
}
