import { randomUUID } from "crypto";
import type { BatchRunState, TerminalBatchRunState } from "../../core/jobs/Job";

const allowedTransitions: Record<BatchRunState, readonly BatchRunState[]> = {
  pending: ["admitted", "cancelled"],
  admitted: ["running", "failed", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: []
};

export const isTerminalState = (state: BatchRunState): state is TerminalBatchRunState =>
  allowedTransitions[state].length === 0;

export type BatchRun = {
  readonly id: string;
  state: () => BatchRunState;
  transition: (next: BatchRunState, details?: Record<string, unknown>) => void;
};

export const createBatchRun = (
  batchSize: number,
  opts: { id?: string; now?: () => number } = {}
): BatchRun => {
  const id = opts.id ?? randomUUID();
  const now = opts.now ?? Date.now;
  const createdAt = now();
  let state: BatchRunState = "pending";

  return {
    id,
    state: () => state,
    transition: (next, details = {}) => {
      if (!allowedTransitions[state].includes(next)) {
        throw new Error(`Invalid batch state transition ${state} -> ${next} for batch ${id}`);
      }
      state = next;

      const log: Record<string, unknown> = { event: "batch.state", batchId: id, state, batchSize, ...details };
      if (isTerminalState(next)) {
        log.durationMs = now() - createdAt;
      }
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(log));
    }
  };
};
