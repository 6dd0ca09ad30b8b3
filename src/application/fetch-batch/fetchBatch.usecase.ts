import type { ResourceFetcher } from "../../ports/ResourceFetcher";
import { createSemaphore } from "../../shared/concurrency/semaphore";
import type { CompletedJob, Job } from "../../core/jobs/Job";
import { countCompleted, createJobs, toCompletedJobs } from "../../core/jobs/Job";
import { toLoggableIdentifier } from "../../core/jobs/identifier";
import type { BatchConfigInput } from "./batch.config";
import { resolveBatchConfig } from "./batch.config";
import type { BatchAbortContext, BatchAbortedError } from "./batch.errors";
import { assertBatchSize, cancelledBatchError, classifyFetchFailure } from "./batch.errors";

export type FetchBatchDeps = {
  fetcher: ResourceFetcher;
  config?: Pick<BatchConfigInput, "maxBatchSize" | "batchConcurrency">;
  batchId?: string;
};

/**
 * Fetches every identifier with at most `batchConcurrency` requests in flight and
 * resolves with the jobs in input order, or rejects with one BatchAbortedError.
 *
 * The first failure or the external signal aborts the batch: a derived signal stops
 * every other request and queued jobs never start. Completion observed after the
 * abort does not count. Stragglers still release their permits after the promise
 * has settled; `batch.drained` is logged once they all have.
 */
export const fetchBatch = async (
  deps: FetchBatchDeps,
  identifiers: readonly string[],
  signal: AbortSignal
): Promise<CompletedJob[]> => {
  const config = resolveBatchConfig(deps.config);
  assertBatchSize(identifiers.length, config.maxBatchSize);

  const jobs = createJobs(identifiers);
  const contextFor = (failed?: { index: number; job: Job }): BatchAbortContext => {
    const context: BatchAbortContext = { batchSize: jobs.length, completed: countCompleted(jobs) };
    if (failed) {
      context.index = failed.index;
      context.url = toLoggableIdentifier(failed.job.url);
    }
    return context;
  };

  if (signal.aborted) throw cancelledBatchError(contextFor(), signal.reason);
  if (jobs.length === 0) return [];

  const batchController = new AbortController();
  const semaphore = createSemaphore(config.batchConcurrency);

  return new Promise<CompletedJob[]>((resolve, reject) => {
    let settled = false;
    let remaining = jobs.length;

    const abortBatch = (error: BatchAbortedError) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onExternalAbort);
      batchController.abort(error);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "batch.aborted",
        batchId: deps.batchId,
        code: error.code,
        reason: error.message,
        ...error.context
      }));
      reject(error);
    };

    const onExternalAbort = () => abortBatch(cancelledBatchError(contextFor(), signal.reason));
    signal.addEventListener("abort", onExternalAbort, { once: true });

    const completeJob = () => {
      if (signal.aborted) {
        onExternalAbort();
        return;
      }
      remaining -= 1;
      if (remaining === 0) {
        const completed = toCompletedJobs(jobs);
        settled = true;
        signal.removeEventListener("abort", onExternalAbort);
        resolve(completed);
      }
    };

    // the batch is aborted before the failing job gives its permit back,
    // so no queued job starts in between
    const runJob = (job: Job, index: number) =>
      semaphore.use(async () => {
        try {
          const status = await deps.fetcher.fetchStatus(job.url, batchController.signal);
          if (settled) return;
          job.status = status;
          completeJob();
        } catch (err) {
          abortBatch(classifyFetchFailure(err, contextFor({ index, job })));
        }
      }, batchController.signal);

    // acquire only rejects once the batch is already aborted
    const tasks = jobs.map((job, index) =>
      runJob(job, index).catch((err: unknown) => abortBatch(classifyFetchFailure(err, contextFor({ index, job }))))
    );

    void Promise.allSettled(tasks).then(() => {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "batch.drained", batchId: deps.batchId, ...semaphore.stats() }));
    });
  });
};
