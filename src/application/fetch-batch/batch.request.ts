import { z } from "zod";
import { maxIdentifierLength } from "../../core/jobs/identifier";
import type { BatchConfig } from "./batch.config";
import { BatchValidationError } from "./batch.errors";

export const createBatchRequestSchema = (maxBatchSize: number) =>
  z
    .array(
      z
        .string({ invalid_type_error: "identifier must be a string" })
        .min(1, { message: "identifier must not be empty" })
        .max(maxIdentifierLength, { message: `identifier must be at most ${maxIdentifierLength} characters` }),
      { invalid_type_error: "request body must be a JSON array of URLs" }
    )
    .max(maxBatchSize, { message: `too many identifiers, please send no more than ${maxBatchSize}` });

export type BatchRequest = z.infer<ReturnType<typeof createBatchRequestSchema>>;

const formatIssue = (issue: z.ZodIssue): string => {
  const [index] = issue.path;
  return index === undefined ? issue.message : `identifier[${String(index)}]: ${issue.message}`;
};

/**
 * Decodes a raw request body into the ordered identifier list.
 * Throws BatchValidationError; nothing is fetched for a rejected body.
 */
export const parseBatchRequest = (body: string, config: Pick<BatchConfig, "maxBatchSize">): BatchRequest => {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new BatchValidationError({ code: "invalid_payload", message: "request body is not valid JSON" });
  }

  const parsed = createBatchRequestSchema(config.maxBatchSize).safeParse(payload);
  if (parsed.success) return parsed.data;

  const [issue] = parsed.error.issues;
  if (!issue) {
    throw new BatchValidationError({ code: "invalid_payload", message: "request body is invalid" });
  }
  const tooMany = issue.code === "too_big" && issue.path.length === 0;
  throw new BatchValidationError({ code: tooMany ? "batch_too_large" : "invalid_payload", message: formatIssue(issue) });
};
