import { ResourceFetchError } from "../../ports/ResourceFetcher";

export type BatchValidationCode = "batch_too_large" | "invalid_payload" | "payload_too_large";
export type BatchAbortCode = "invalid_identifier" | "fetch_timeout" | "fetch_failed" | "cancelled";

export type BatchAbortContext = {
  batchSize: number;
  completed: number;
  index?: number;
  url?: string;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Raised at the boundary before a batch is admitted; no job exists yet.
 */
export class BatchValidationError extends Error {
  readonly code: BatchValidationCode;

  constructor(args: { code: BatchValidationCode; message: string }) {
    super(args.message);
    this.name = "BatchValidationError";
    this.code = args.code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The single error a batch resolves to when any job fails or the batch is cancelled.
 * `context.completed` is diagnostic only and never reaches the caller.
 */
export class BatchAbortedError extends Error {
  readonly code: BatchAbortCode;
  readonly context: BatchAbortContext;
  readonly cause?: unknown;

  constructor(args: { code: BatchAbortCode; message: string; context: BatchAbortContext; cause?: unknown }) {
    super(args.message);
    this.name = "BatchAbortedError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const assertBatchSize = (size: number, maxBatchSize: number): void => {
  if (size > maxBatchSize) {
    throw new BatchValidationError({
      code: "batch_too_large",
      message: `too many identifiers: ${size}, please send no more than ${maxBatchSize}`
    });
  }
};

const codeForFetchError = (err: ResourceFetchError): BatchAbortCode => {
  switch (err.kind) {
    case "invalid_identifier":
      return "invalid_identifier";
    case "timeout":
      return "fetch_timeout";
    case "cancelled":
      return "cancelled";
    case "network":
      return "fetch_failed";
  }
};

export const classifyFetchFailure = (
  reason: unknown,
  context: BatchAbortContext
): BatchAbortedError => {
  if (reason instanceof BatchAbortedError) return reason;

  const code = reason instanceof ResourceFetchError ? codeForFetchError(reason) : "fetch_failed";
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new BatchAbortedError({
    code,
    message: toErrorMessage(reason),
    context,
    cause
  });
};

export const cancelledBatchError = (context: BatchAbortContext, reason?: unknown): BatchAbortedError =>
  new BatchAbortedError({
    code: "cancelled",
    message: "batch cancelled by caller",
    context,
    cause: reason
  });
