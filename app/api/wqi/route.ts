// app/api/wqi/route.ts
import { NextResponse } from "next/server";
import {
  calculateWQIFromReading,
  isInvalidParameterError,
  parameterLabels,
  parseParameterReading,
  summarizeWQI,
  wqiResultToJson,
} from "@/lib/wqi";

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json(
      { error: "Request body must be valid JSON" },
      { status: 400 }
    );
  }

  try {
    // 1. Loose JSON map -> typed reading
    const reading = parseParameterReading(body);

    // 2. Score it
    const result = calculateWQIFromReading(reading);

    return NextResponse.json({
      ...wqiResultToJson(result),
      labels: parameterLabels(result.reading),
      summary: summarizeWQI(result),
    });
  } catch (err) {
    if (isInvalidParameterError(err)) {
      return NextResponse.json(
        { error: err.message, parameter: err.parameter },
        { status: 400 }
      );
    }

    console.error(err);
    return NextResponse.json({ error: "Server error" }, { status: 500 });
  }
}
