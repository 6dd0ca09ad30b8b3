import type { ResourceFetcher } from "../../src/ports/ResourceFetcher";
import { ResourceFetchError } from "../../src/ports/ResourceFetcher";
import { AdmissionGate } from "../../src/application/fetch-batch/admissionGate";
import { BatchAbortedError, BatchValidationError } from "../../src/application/fetch-batch/batch.errors";
import { processBatch } from "../../src/application/fetch-batch/processBatch.usecase";

const delayedFetcher = (delays: Record<string, number>, failing: string[] = []): ResourceFetcher => ({
  fetchStatus: (url, signal) =>
    new Promise<number>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new ResourceFetchError({ kind: "cancelled", message: `cancelled ${url}`, url }));
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        if (failing.includes(url)) {
          reject(new ResourceFetchError({ kind: "network", message: `refused ${url}`, url }));
          return;
        }
        resolve(200);
      }, delays[url] ?? 0);
      signal.addEventListener("abort", onAbort, { once: true });
    })
});

const waitFor = async (predicate: () => boolean, timeoutMs = 2000) => {
  const startedAt = Date.now();
  while (!predicate()) {
    if (Date.now() - startedAt > timeoutMs) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
};

type StateLog = { event: string; batchId: string; state: string; code?: string };

describe("processBatch", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  const stateLogs = (): StateLog[] =>
    logSpy.mock.calls
      .map(([line]) => JSON.parse(String(line)) as StateLog)
      .filter((log) => log.event === "batch.state");

  const statesByBatch = (): Map<string, string[]> => {
    const byBatch = new Map<string, string[]>();
    for (const log of stateLogs()) {
      byBatch.set(log.batchId, [...(byBatch.get(log.batchId) ?? []), log.state]);
    }
    return byBatch;
  };

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("runs an admitted batch to completion and frees the slot", async () => {
    const gate = new AdmissionGate(2);
    const fetcher = delayedFetcher({});

    const jobs = await processBatch(
      { gate, fetcher },
      ["https://a.example/ok", "https://b.example/ok"],
      new AbortController().signal
    );

    expect(jobs).toEqual([
      { url: "https://a.example/ok", status: 200 },
      { url: "https://b.example/ok", status: 200 }
    ]);
    expect(stateLogs().map((log) => log.state)).toEqual(["admitted", "running", "completed"]);
    expect(gate.stats()).toEqual({ permits: 2, inUse: 0, waiting: 0 });
  });

  it("marks the run failed and frees the slot when a fetch fails", async () => {
    const gate = new AdmissionGate(2);
    const fetcher = delayedFetcher({}, ["https://b.example/down"]);

    const outcome = processBatch(
      { gate, fetcher },
      ["https://a.example/ok", "https://b.example/down"],
      new AbortController().signal
    );

    await expect(outcome).rejects.toBeInstanceOf(BatchAbortedError);
    await expect(outcome).rejects.toThrow("refused https://b.example/down");
    const logs = stateLogs();
    expect(logs.map((log) => log.state)).toEqual(["admitted", "running", "failed"]);
    expect(logs[2].code).toBe("fetch_failed");
    expect(gate.stats().inUse).toBe(0);
  });

  it("marks the run cancelled when the caller goes away mid-batch", async () => {
    const gate = new AdmissionGate(2);
    const fetcher = delayedFetcher({ "https://a.example/slow": 1000 });
    const controller = new AbortController();

    const outcome = processBatch({ gate, fetcher }, ["https://a.example/slow"], controller.signal);
    await waitFor(() => stateLogs().length === 2);
    controller.abort();

    await expect(outcome).rejects.toThrow("batch cancelled by caller");
    expect(stateLogs().map((log) => log.state)).toEqual(["admitted", "running", "cancelled"]);
    expect(gate.stats().inUse).toBe(0);
  });

  it("cancels a batch that is still waiting for admission", async () => {
    const gate = new AdmissionGate(1);
    const fetcher = delayedFetcher({ "https://a.example/slow": 100 });
    const controller = new AbortController();

    const first = processBatch({ gate, fetcher }, ["https://a.example/slow"], new AbortController().signal);
    const second = processBatch({ gate, fetcher }, ["https://b.example/ok"], controller.signal);
    await waitFor(() => gate.stats().waiting === 1);
    controller.abort();

    const error = await second.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BatchAbortedError);
    expect(error).toMatchObject({ code: "cancelled", context: { batchSize: 1, completed: 0 } });

    await expect(first).resolves.toEqual([{ url: "https://a.example/slow", status: 200 }]);
    const states = [...statesByBatch().values()];
    expect(states).toContainEqual(["cancelled"]);
    expect(states).toContainEqual(["admitted", "running", "completed"]);
    expect(gate.stats()).toEqual({ permits: 1, inUse: 0, waiting: 0 });
  });

  it("rejects an oversized batch before it is admitted", async () => {
    const gate = new AdmissionGate(1);
    const fetchStatus = jest.fn<Promise<number>, [string, AbortSignal]>();
    const identifiers = Array.from({ length: 21 }, (_, i) => `https://host${i}.example/ok`);

    await expect(
      processBatch({ gate, fetcher: { fetchStatus } }, identifiers, new AbortController().signal)
    ).rejects.toBeInstanceOf(BatchValidationError);

    expect(fetchStatus).not.toHaveBeenCalled();
    expect(stateLogs()).toHaveLength(0);
  });

  it("lets the 101st concurrent batch in once a running batch finishes", async () => {
    const gate = new AdmissionGate(100);
    const fetcher = delayedFetcher({ "https://a.example/slow": 200 });

    const running = Array.from({ length: 100 }, () =>
      processBatch({ gate, fetcher }, ["https://a.example/slow"], new AbortController().signal)
    );
    const extra = processBatch({ gate, fetcher }, ["https://b.example/ok"], new AbortController().signal);

    await waitFor(() => gate.stats().waiting === 1);
    expect(gate.stats().inUse).toBe(100);

    await expect(extra).resolves.toEqual([{ url: "https://b.example/ok", status: 200 }]);
    await Promise.all(running);
    expect(gate.stats()).toEqual({ permits: 100, inUse: 0, waiting: 0 });
  });
});
