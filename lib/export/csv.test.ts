import { describe, expect, it } from "vitest";
import { calculateBatch } from "@/lib/wqi/batch";
import { BATCH_CSV_COLUMNS, batchToCsvRows, escapeCsvField, toCsv } from "./csv";

describe("escapeCsvField", () => {
  it("quotes fields with commas, quotes or newlines", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
    expect(escapeCsvField("st\r1")).toBe('"st\r1"');
  });
});

describe("toCsv", () => {
  it("returns an empty string for no rows", () => {
    expect(toCsv([])).toBe("");
  });

  it("takes headers from the first row by default", () => {
    expect(toCsv([{ a: "x,y", b: 'say "hi"', c: null }, { a: 1, b: true, c: undefined }])).toBe(
      'a,b,c\n"x,y","say ""hi""",\n1,true,\n'
    );
  });

  it("writes the header for no rows when columns are given", () => {
    expect(toCsv([], ["a", "b"])).toBe("a,b\n");
  });

  it("follows an explicit column list", () => {
    expect(toCsv([{ a: 1, b: 2 }], ["b", "missing"])).toBe("b,missing\n2,\n");
  });
});

describe("batchToCsvRows", () => {
  it("flattens computed and failed samples", () => {
    const outcomes = calculateBatch([
      {
        stationId: "st-1",
        timestamp: "2024-04-01",
        reading: { ph: 7.6, bod: 2.2, dissolvedOxygen: 5.5, fecalColiform: 6 },
      },
      {
        stationId: "st-2",
        reading: { ph: 7, bod: 2, dissolvedOxygen: 5, fecalColiform: 0 },
      },
    ]);

    const lines = toCsv(batchToCsvRows(outcomes), BATCH_CSV_COLUMNS).split("\n");

    expect(lines).toEqual([
      "station_id,timestamp,ph,bod,dissolved_oxygen,fecal_coliform,water_temperature,wqi,classification,cpcb_class,status,error",
      "st-1,2024-04-01,7.6,2.2,5.5,6,25,83.17,Good to Excellent,A,Non Polluted,",
      "st-2,,7,2,5,0,,,,,,Invalid fecalColiform: must be greater than 0 MPN/100mL",
      "",
    ]);
  });
});
