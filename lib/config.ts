// lib/config.ts

export const DEFAULT_MAX_BATCH_SIZE = 500;

export interface WqiConfig {
  maxBatchSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WqiConfig {
  const raw = env.WQI_MAX_BATCH_SIZE;
  let maxBatchSize = DEFAULT_MAX_BATCH_SIZE;

  if (raw !== undefined && raw.trim() !== "") {
    const parsed = Number(raw);
    if (Number.isInteger(parsed) && parsed > 0) {
      maxBatchSize = parsed;
    } else {
      console.warn(
        `Ignoring WQI_MAX_BATCH_SIZE=${raw}; using ${DEFAULT_MAX_BATCH_SIZE}`
      );
    }
  }

  return { maxBatchSize };
}
