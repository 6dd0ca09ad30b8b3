import { maxIdentifierLength } from "../../core/jobs/identifier";

export type BatchConfig = {
  maxBatchSize: number;
  batchConcurrency: number;
  maxInflightBatches: number;
  fetchTimeoutMs: number;
};

export type BatchConfigInput = Partial<BatchConfig>;

export const defaultBatchConfig: BatchConfig = {
  maxBatchSize: 20,
  batchConcurrency: 4,
  maxInflightBatches: 100,
  fetchTimeoutMs: 1000
};

export const batchCaps = {
  maxBatchSize: { min: 1, max: 100 },
  batchConcurrency: { min: 1, max: 50 },
  maxInflightBatches: { min: 1, max: 10000 },
  fetchTimeoutMs: { min: 50, max: 30000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateBatchConfig = (config: BatchConfig): BatchConfig => {
  assertIntegerInRange("maxBatchSize", config.maxBatchSize, batchCaps.maxBatchSize.min, batchCaps.maxBatchSize.max);
  assertIntegerInRange(
    "batchConcurrency",
    config.batchConcurrency,
    batchCaps.batchConcurrency.min,
    batchCaps.batchConcurrency.max
  );
  assertIntegerInRange(
    "maxInflightBatches",
    config.maxInflightBatches,
    batchCaps.maxInflightBatches.min,
    batchCaps.maxInflightBatches.max
  );
  assertIntegerInRange(
    "fetchTimeoutMs",
    config.fetchTimeoutMs,
    batchCaps.fetchTimeoutMs.min,
    batchCaps.fetchTimeoutMs.max
  );
  return config;
};

export const resolveBatchConfig = (input: BatchConfigInput = {}): BatchConfig =>
  validateBatchConfig({ ...defaultBatchConfig, ...input });

/**
 * Upper bound for a request body holding `maxBatchSize` identifiers:
 * each entry costs its quotes and separator, the array its brackets.
 */
export const maxRequestBodyBytes = (config: Pick<BatchConfig, "maxBatchSize">): number =>
  config.maxBatchSize * (maxIdentifierLength + 4) + 3;
