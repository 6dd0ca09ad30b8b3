import type http from "http";
import { AdmissionGate } from "../application/fetch-batch/admissionGate";
import type { BatchConfig } from "../application/fetch-batch/batch.config";
import { HttpResourceFetcher } from "../infrastructure/http/HttpResourceFetcher";
import { createServer } from "../server";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type RunningService = {
  server: http.Server;
  gate: AdmissionGate;
  address: { host: string; port: number };
  shutdown: () => Promise<void>;
};

export const buildServer = (config: BatchConfig): { server: http.Server; gate: AdmissionGate } => {
  const fetcher = new HttpResourceFetcher(config.fetchTimeoutMs);
  const gate = new AdmissionGate(config.maxInflightBatches);
  return { server: createServer({ gate, fetcher, config }), gate };
};

/**
 * Stops accepting connections and waits up to `graceMs` for in-flight requests.
 * Connections still open after that are closed, which cancels their batches.
 */
export const shutdownServer = (server: http.Server, graceMs: number): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const forceClose = setTimeout(() => server.closeAllConnections(), graceMs);
    server.close((err) => {
      clearTimeout(forceClose);
      if (err) reject(err);
      else resolve();
    });
    server.closeIdleConnections();
  });

export const startService = async (): Promise<RunningService> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const { server, gate } = buildServer(runtime.batchConfig);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(env.PORT, env.HOST, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const bound = server.address();
  const port = bound !== null && typeof bound === "object" ? bound.port : env.PORT;

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "server.listening", host: env.HOST, port, ...runtime.batchConfig }));

  return {
    server,
    gate,
    address: { host: env.HOST, port },
    shutdown: () => shutdownServer(server, runtime.shutdownGraceMs)
  };
};
