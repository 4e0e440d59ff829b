import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_MAX_BATCH_SIZE, loadConfig } from "./config";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadConfig", () => {
  it("uses the default batch size when unset", () => {
    expect(loadConfig({})).toEqual({ maxBatchSize: DEFAULT_MAX_BATCH_SIZE });
  });

  it("reads WQI_MAX_BATCH_SIZE", () => {
    expect(loadConfig({ WQI_MAX_BATCH_SIZE: "50" })).toEqual({ maxBatchSize: 50 });
  });

  it("warns and falls back on an invalid value", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(loadConfig({ WQI_MAX_BATCH_SIZE: "-3" })).toEqual({ maxBatchSize: 500 });
    expect(warn).toHaveBeenCalledWith("Ignoring WQI_MAX_BATCH_SIZE=-3; using 500");
  });
});
