// lib/export/csv.ts

import type { SampleOutcome } from "@/lib/wqi/batch";

export type CsvValue = string | number | boolean | null | undefined;
export type CsvRow = Record<string, CsvValue>;

export const BATCH_CSV_COLUMNS = [
  "station_id",
  "timestamp",
  "ph",
  "bod",
  "dissolved_oxygen",
  "fecal_coliform",
  "water_temperature",
  "wqi",
  "classification",
  "cpcb_class",
  "status",
  "error",
] as const;

export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

// With explicit columns the header row is written even for no rows.
export function toCsv(rows: readonly CsvRow[], columns?: readonly string[]): string {
  if (rows.length === 0 && columns === undefined) return "";

  const headers = columns ?? Object.keys(rows[0]);
  const lines = [headers.map(escapeCsvField).join(",")];

  for (const row of rows) {
    lines.push(
      headers.map((h) => escapeCsvField(String(row[h] ?? ""))).join(",")
    );
  }

  return lines.join("\n") + "\n";
}

export function batchToCsvRows(outcomes: readonly SampleOutcome[]): CsvRow[] {
  return outcomes.map((outcome) => {
    const base = {
      station_id: outcome.stationId,
      timestamp: outcome.timestamp ?? "",
    };

    if (!outcome.ok) {
      const { reading, error } = outcome;
      return {
        ...base,
        ph: reading.ph,
        bod: reading.bod,
        dissolved_oxygen: reading.dissolvedOxygen,
        fecal_coliform: reading.fecalColiform,
        water_temperature: reading.waterTemperature,
        wqi: "",
        classification: "",
        cpcb_class: "",
        status: "",
        error: error.message,
      };
    }

    const { result } = outcome;
    return {
      ...base,
      ph: result.reading.ph,
      bod: result.reading.bod,
      dissolved_oxygen: result.reading.dissolvedOxygen,
      fecal_coliform: result.reading.fecalColiform,
      water_temperature: result.reading.waterTemperature,
      wqi: result.compositeScore.toFixed(2),
      classification: result.classification,
      cpcb_class: result.cpcbClass,
      status: result.status,
      error: "",
    };
  });
}
