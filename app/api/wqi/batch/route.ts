// app/api/wqi/batch/route.ts
import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/config";
import { BATCH_CSV_COLUMNS, batchToCsvRows, toCsv } from "@/lib/export/csv";
import { toJson } from "@/lib/export/json";
import {
  calculateBatch,
  complianceReport,
  isInvalidParameterError,
  isRecord,
  parseParameterReading,
  summarizeBatch,
  wqiResultToJson,
  type StationSample,
} from "@/lib/wqi";

function parseSample(raw: unknown, index: number): StationSample {
  const data = isRecord(raw) ? raw : {};
  const stationId =
    typeof data.stationId === "string"
      ? data.stationId
      : typeof data.station_id === "string"
        ? data.station_id
        : `sample-${index + 1}`;
  const timestamp = typeof data.timestamp === "string" ? data.timestamp : undefined;

  return { stationId, timestamp, reading: parseParameterReading(raw) };
}

export async function POST(request: Request) {
  const { maxBatchSize } = loadConfig();

  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json(
      { error: "Request body must be valid JSON" },
      { status: 400 }
    );
  }

  const samples = isRecord(body) ? body.samples : undefined;

  if (!Array.isArray(samples)) {
    return NextResponse.json(
      { error: "samples must be an array" },
      { status: 400 }
    );
  }

  if (samples.length > maxBatchSize) {
    return NextResponse.json(
      { error: `At most ${maxBatchSize} samples per request` },
      { status: 400 }
    );
  }

  try {
    const parsed: StationSample[] = [];
    for (const [index, raw] of samples.entries()) {
      try {
        parsed.push(parseSample(raw, index));
      } catch (err) {
        if (!isInvalidParameterError(err)) throw err;
        return NextResponse.json(
          { error: `samples[${index}]: ${err.message}`, parameter: err.parameter },
          { status: 400 }
        );
      }
    }

    const outcomes = calculateBatch(parsed);
    const { searchParams } = new URL(request.url);

    if (searchParams.get("format") === "csv") {
      return new NextResponse(toCsv(batchToCsvRows(outcomes), BATCH_CSV_COLUMNS), {
        status: 200,
        headers: { "Content-Type": "text/csv; charset=utf-8" },
      });
    }

    const payload = {
      results: outcomes.map((outcome) =>
        outcome.ok
          ? {
              stationId: outcome.stationId,
              timestamp: outcome.timestamp ?? null,
              ...wqiResultToJson(outcome.result),
            }
          : {
              stationId: outcome.stationId,
              timestamp: outcome.timestamp ?? null,
              error: outcome.error.message,
              parameter: outcome.error.parameter,
            }
      ),
      summary: summarizeBatch(outcomes),
      compliance: complianceReport(outcomes),
    };

    if (searchParams.get("pretty") === "1") {
      return new NextResponse(toJson(payload, true), {
        status: 200,
        headers: { "Content-Type": "application/json" },
      });
    }

    return NextResponse.json(payload);
  } catch (err) {
    console.error(err);
    return NextResponse.json({ error: "Server error" }, { status: 500 });
  }
}
