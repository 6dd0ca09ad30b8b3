import type { ResourceFetcher } from "../../ports/ResourceFetcher";
import { ResourceFetchError } from "../../ports/ResourceFetcher";
import { parseHttpIdentifier, toLoggableIdentifier } from "../../core/jobs/identifier";

export const defaultFetchTimeoutMs = 1000;

const readStringField = (value: unknown, field: string): string | undefined => {
  if (typeof value !== "object" || value === null || !(field in value)) return undefined;
  const entry: unknown = Reflect.get(value, field);
  return typeof entry === "string" && entry !== "" ? entry : undefined;
};

// undici errors come from another realm under some runners, so match on shape.
// Messages that echo a URL are dropped.
export const describeNetworkFailure = (err: unknown): string => {
  const cause: unknown = typeof err === "object" && err !== null ? Reflect.get(err, "cause") : undefined;
  const code = readStringField(cause, "code") ?? readStringField(err, "code");
  if (code) return code;

  const message = readStringField(err, "message");
  if (message && !message.includes("://")) return message;

  return readStringField(err, "name") ?? "unknown error";
};

const decodeUserinfo = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

/**
 * fetch refuses URLs with userinfo; move it into a Basic Authorization header.
 */
export const toRequestTarget = (target: URL): { url: URL; headers: Record<string, string> } => {
  if (target.username === "" && target.password === "") return { url: target, headers: {} };

  const url = new URL(target.href);
  const credentials = `${decodeUserinfo(url.username)}:${decodeUserinfo(url.password)}`;
  url.username = "";
  url.password = "";

  return {
    url,
    headers: { authorization: `Basic ${Buffer.from(credentials, "utf8").toString("base64")}` }
  };
};

/**
 * Single timed GET using native fetch (Node 20).
 * Any HTTP status is a successful retrieval; the body is discarded unread.
 */
export class HttpResourceFetcher implements ResourceFetcher {
  constructor(private readonly timeoutMs = defaultFetchTimeoutMs) {}

  async fetchStatus(url: string, signal: AbortSignal): Promise<number> {
    const safeUrl = toLoggableIdentifier(url);

    if (signal.aborted) {
      throw this.fail({ kind: "cancelled", message: `Request to ${safeUrl} cancelled before start`, url: safeUrl });
    }

    const target = parseHttpIdentifier(url);
    if (!target) {
      throw this.fail({
        kind: "invalid_identifier",
        message: `Invalid identifier: ${safeUrl} is not an absolute http/https URL`,
        url: safeUrl
      });
    }

    const request = toRequestTarget(target);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    const startedAt = Date.now();
    let res: Response;
    try {
      res = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        redirect: "follow",
        signal: controller.signal
      });
    } catch (err) {
      if (timedOut) {
        throw this.fail({
          kind: "timeout",
          message: `Request to ${safeUrl} timed out after ${this.timeoutMs}ms`,
          url: safeUrl,
          cause: err
        });
      }
      if (signal.aborted) {
        throw this.fail({ kind: "cancelled", message: `Request to ${safeUrl} cancelled`, url: safeUrl, cause: err });
      }
      throw this.fail({
        kind: "network",
        message: `Request to ${safeUrl} failed: ${describeNetworkFailure(err)}`,
        url: safeUrl,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      signal.removeEventListener("abort", onAbort);
    }

    await res.body?.cancel().catch(() => undefined);

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "fetch.completed",
      url: safeUrl,
      status: res.status,
      durationMs: Date.now() - startedAt
    }));

    return res.status;
  }

  private fail(args: ConstructorParameters<typeof ResourceFetchError>[0]): ResourceFetchError {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "fetch.failed", url: args.url, kind: args.kind }));
    return new ResourceFetchError(args);
  }
}
