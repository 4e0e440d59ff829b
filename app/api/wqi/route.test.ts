import { describe, expect, it } from "vitest";
import { POST } from "./route";

function post(body: string) {
  return POST(
    new Request("http://localhost/api/wqi", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    })
  );
}

describe("POST /api/wqi", () => {
  it("scores a reading", async () => {
    const res = await post(
      JSON.stringify({ ph: 7.6, bod: 2.2, dissolvedOxygen: 5.5, fecalColiform: 6 })
    );
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.wqi).toBeCloseTo(83.16, 1);
    expect(json.classification).toBe("Good to Excellent");
    expect(json.cpcbClass).toBe("A");
    expect(json.status).toBe("Non Polluted");
    expect(json.subIndices.ph).toBeCloseTo(90.1, 2);
    expect(json.warnings).toEqual([]);
    expect(json.labels).toEqual({
      ph: "Neutral",
      bod: "Low Organic Load",
      dissolvedOxygen: "Adequate",
      fecalColiform: "Within Bathing Limit",
    });
    expect(json.summary).toBe(
      "Good to Excellent (Non Polluted); meets outdoor bathing criteria."
    );
  });

  it("accepts the dashboard's snake_case keys", async () => {
    const res = await post(
      JSON.stringify({ pH: "4", BOD: 40, dissolved_oxygen: 0.5, fecal_coliform: 200000 })
    );
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.classification).toBe("Bad to Very Bad");
    expect(json.cpcbClass).toBe("D/E");
  });

  it("returns 400 for zero fecal coliform", async () => {
    const res = await post(
      JSON.stringify({ ph: 7, bod: 2, dissolvedOxygen: 5, fecalColiform: 0 })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid fecalColiform: must be greater than 0 MPN/100mL",
      parameter: "fecalColiform",
    });
  });

  it("returns 400 for a missing parameter", async () => {
    const res = await post(JSON.stringify({ bod: 2, dissolvedOxygen: 5, fecalColiform: 3 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid ph: is required", parameter: "ph" });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await post("ph=7");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Request body must be valid JSON" });
  });
});
