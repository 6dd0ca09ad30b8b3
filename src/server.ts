import http from "http";
import type { ResourceFetcher } from "./ports/ResourceFetcher";
import type { AdmissionGate } from "./application/fetch-batch/admissionGate";
import type { BatchConfig } from "./application/fetch-batch/batch.config";
import { maxRequestBodyBytes } from "./application/fetch-batch/batch.config";
import { BatchAbortedError, BatchValidationError } from "./application/fetch-batch/batch.errors";
import { parseBatchRequest } from "./application/fetch-batch/batch.request";
import { processBatch } from "./application/fetch-batch/processBatch.usecase";

export type ServerDeps = {
  gate: AdmissionGate;
  fetcher: ResourceFetcher;
  config: BatchConfig;
};

const readBody = (req: http.IncomingMessage, limitBytes: number): Promise<string> =>
  new Promise((resolve, reject) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limitBytes) {
      req.resume();
      reject(new BatchValidationError({
        code: "payload_too_large",
        message: `request body exceeds ${limitBytes} bytes`
      }));
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    let exceeded = false;

    req.on("data", (chunk: Buffer) => {
      if (exceeded) return;
      size += chunk.length;
      if (size > limitBytes) {
        exceeded = true;
        reject(new BatchValidationError({
          code: "payload_too_large",
          message: `request body exceeds ${limitBytes} bytes`
        }));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!exceeded) resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });

const statusForError = (err: unknown): number => {
  if (err instanceof BatchValidationError) return err.code === "payload_too_large" ? 413 : 400;
  if (err instanceof BatchAbortedError) return 502;
  return 500;
};

const writeText = (res: http.ServerResponse, status: number, message: string, headers: http.OutgoingHttpHeaders = {}) => {
  res.writeHead(status, { ...headers, "content-type": "text/plain; charset=utf-8" });
  res.end(message);
};

export const createRequestHandler = (deps: ServerDeps) => {
  const bodyLimit = maxRequestBodyBytes(deps.config);

  return async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    if (path !== "/") {
      writeText(res, 404, "Not Found");
      return;
    }
    if (req.method !== "POST") {
      writeText(res, 405, "Method Not Allowed", { allow: "POST" });
      return;
    }

    // the batch lives as long as the client connection
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort(new Error("client closed request"));
    });

    try {
      const body = await readBody(req, bodyLimit);
      const identifiers = parseBatchRequest(body, deps.config);
      const jobs = await processBatch(deps, identifiers, controller.signal);

      res.writeHead(200, { "content-type": "application/json; charset=utf-8" });
      res.end(JSON.stringify(jobs));
    } catch (err) {
      if (controller.signal.aborted || res.headersSent) return;

      const status = statusForError(err);
      if (status === 500) {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({
          event: "http.unhandled_error",
          message: err instanceof Error ? err.message : String(err)
        }));
        writeText(res, 500, "Internal Server Error");
        return;
      }

      const message = err instanceof Error ? err.message : String(err);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.request_rejected",
        status,
        code: err instanceof BatchValidationError || err instanceof BatchAbortedError ? err.code : undefined,
        message
      }));
      writeText(res, status, message);
    }
  };
};

export const createServer = (deps: ServerDeps): http.Server => {
  const handle = createRequestHandler(deps);
  return http.createServer((req, res) => {
    void handle(req, res);
  });
};
