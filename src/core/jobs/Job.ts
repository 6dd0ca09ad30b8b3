/**
 * One unit of work per identifier. `status` is written once by the fetcher
 * that owns the job and is absent until then.
 */
export type Job = {
  readonly url: string;
  status?: number;
};

export type CompletedJob = {
  url: string;
  status: number;
};

export type BatchRunState = "pending" | "admitted" | "running" | "completed" | "failed" | "cancelled";

export type TerminalBatchRunState = Extract<BatchRunState, "completed" | "failed" | "cancelled">;

export const createJobs = (identifiers: readonly string[]): Job[] => identifiers.map((url) => ({ url }));

export const isCompleted = (job: Job): job is Job & { status: number } => typeof job.status === "number";

export const countCompleted = (jobs: readonly Job[]): number => jobs.filter(isCompleted).length;

export const toCompletedJobs = (jobs: readonly Job[]): CompletedJob[] =>
  jobs.map((job) => {
    if (!isCompleted(job)) {
      throw new Error(`Job for ${job.url} has no status`);
    }
    return { url: job.url, status: job.status };
  });
