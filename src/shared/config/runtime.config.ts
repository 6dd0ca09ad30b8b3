import {
  batchCaps,
  defaultBatchConfig,
  type BatchConfig,
  validateBatchConfig
} from "../../application/fetch-batch/batch.config";
import { ConfigError } from "./config.error";

export const runtimeCaps = {
  shutdownGraceMs: { min: 0, max: 60000 }
} as const;

export type RuntimeConfig = {
  batchConfig: BatchConfig;
  shutdownGraceMs: number;
};

type IntRange = { readonly min: number; readonly max: number };

// blank counts as unset
const readIntSetting = (env: NodeJS.ProcessEnv, key: string, range: IntRange, fallback: number): number => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (Number.isInteger(value) && value >= range.min && value <= range.max) return value;

  throw new ConfigError(key, `${key}=${raw} is out of allowed range [${range.min}..${range.max}]`);
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const batchConfig = validateBatchConfig({
    maxBatchSize: readIntSetting(env, "MAX_BATCH_SIZE", batchCaps.maxBatchSize, defaultBatchConfig.maxBatchSize),
    batchConcurrency: readIntSetting(
      env,
      "BATCH_CONCURRENCY",
      batchCaps.batchConcurrency,
      defaultBatchConfig.batchConcurrency
    ),
    maxInflightBatches: readIntSetting(
      env,
      "MAX_INFLIGHT_BATCHES",
      batchCaps.maxInflightBatches,
      defaultBatchConfig.maxInflightBatches
    ),
    fetchTimeoutMs: readIntSetting(env, "FETCH_TIMEOUT_MS", batchCaps.fetchTimeoutMs, defaultBatchConfig.fetchTimeoutMs)
  });

  const shutdownGraceMs = readIntSetting(env, "SHUTDOWN_GRACE_MS", runtimeCaps.shutdownGraceMs, 5000);

  return { batchConfig, shutdownGraceMs };
};
