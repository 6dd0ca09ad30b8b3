import type { ResourceFetcher } from "../../ports/ResourceFetcher";
import type { CompletedJob } from "../../core/jobs/Job";
import type { AdmissionGate } from "./admissionGate";
import type { BatchConfigInput } from "./batch.config";
import { resolveBatchConfig } from "./batch.config";
import { assertBatchSize, BatchAbortedError, cancelledBatchError } from "./batch.errors";
import { createBatchRun } from "./batchRun";
import { fetchBatch } from "./fetchBatch.usecase";

export type ProcessBatchDeps = {
  gate: AdmissionGate;
  fetcher: ResourceFetcher;
  config?: BatchConfigInput;
};

/**
 * Runs one validated batch end to end: waits for admission, fetches, and moves
 * the run to its terminal state before the admission slot is given back.
 */
export const processBatch = async (
  deps: ProcessBatchDeps,
  identifiers: readonly string[],
  signal: AbortSignal
): Promise<CompletedJob[]> => {
  const config = resolveBatchConfig(deps.config);
  assertBatchSize(identifiers.length, config.maxBatchSize);

  const run = createBatchRun(identifiers.length);

  const runAdmitted = async (): Promise<CompletedJob[]> => {
    run.transition("admitted", { inflight: deps.gate.stats().inUse });
    run.transition("running");
    try {
      const jobs = await fetchBatch({ fetcher: deps.fetcher, config, batchId: run.id }, identifiers, signal);
      run.transition("completed");
      return jobs;
    } catch (err) {
      const code = err instanceof BatchAbortedError ? err.code : undefined;
      run.transition(signal.aborted ? "cancelled" : "failed", { code });
      throw err;
    }
  };

  try {
    return await deps.gate.admit(runAdmitted, signal);
  } catch (err) {
    if (run.state() !== "pending") throw err;
    // cancelled while waiting for admission
    run.transition("cancelled");
    throw cancelledBatchError({ batchSize: identifiers.length, completed: 0 }, err);
  }
};
