import { describe, expect, it } from "vitest";
import { calculateWQI } from "./calculate";
import { LOWEST_BAND, WQI_BANDS, classifyWQI, mpcbClass } from "./classification";
import { WQI_WEIGHTS, weightSum } from "./constants";

describe("weights", () => {
  it("sum to 1", () => {
    expect(weightSum()).toBe(1);
  });

  it("cannot be reassigned", () => {
    expect(Object.isFrozen(WQI_WEIGHTS)).toBe(true);
  });
});

const BAND_CASES: Array<[number, string, string, string]> = [
  [100, "Good to Excellent", "A", "Non Polluted"],
  [63.0, "Good to Excellent", "A", "Non Polluted"],
  [62.999, "Medium to Good", "B", "Non Polluted"],
  [50.0, "Medium to Good", "B", "Non Polluted"],
  [49.999, "Bad", "C", "Polluted"],
  [38.0, "Bad", "C", "Polluted"],
  [37.999, "Bad to Very Bad", "D/E", "Heavily Polluted"],
  [0, "Bad to Very Bad", "D/E", "Heavily Polluted"],
];

describe("classifyWQI", () => {
  it.each(BAND_CASES)("puts %s in %s", (score, classification, cpcbClass, status) => {
    expect(classifyWQI(score)).toEqual({ classification, cpcbClass, status });
  });
});

describe("mpcbClass", () => {
  it("maps the state-board classes", () => {
    expect(mpcbClass(63)).toBe("A-I");
    expect(mpcbClass(62.9)).toBe("A-II");
    expect(mpcbClass(38)).toBe("A-II");
    expect(mpcbClass(37.9)).toBe("A-III");
    expect(mpcbClass(25)).toBe("A-III");
    expect(mpcbClass(24.9)).toBe("A-IV");
  });
});

describe("band table", () => {
  it("is frozen all the way down", () => {
    expect(Object.isFrozen(WQI_BANDS)).toBe(true);
    for (const entry of WQI_BANDS) {
      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry.band)).toBe(true);
    }
    expect(Object.isFrozen(LOWEST_BAND)).toBe(true);
  });

  it("cannot be changed through a returned band", () => {
    const returned = classifyWQI(70);

    expect(Reflect.set(returned, "cpcbClass", "C")).toBe(false);
    expect(Reflect.set(classifyWQI(10), "status", "Non Polluted")).toBe(false);

    const next = calculateWQI(7.6, 2.2, 5.5, 6);
    expect(next.cpcbClass).toBe("A");
    expect(next.classification).toBe("Good to Excellent");
    expect(calculateWQI(4, 40, 0.5, 200_000).status).toBe("Heavily Polluted");
  });
});
