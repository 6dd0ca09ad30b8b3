export type FetchFailureKind = "invalid_identifier" | "timeout" | "network" | "cancelled";

export interface ResourceFetcher {
  /**
   * Performs one timed retrieval and resolves with the response status code.
   * Rejects with a `ResourceFetchError` on any failure, including cancellation.
   */
  fetchStatus(url: string, signal: AbortSignal): Promise<number>;
}

export class ResourceFetchError extends Error {
  readonly kind: FetchFailureKind;
  readonly url: string;
  readonly cause?: unknown;

  constructor(args: { kind: FetchFailureKind; message: string; url: string; cause?: unknown }) {
    super(args.message);
    this.name = "ResourceFetchError";
    this.kind = args.kind;
    this.url = args.url;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
