#!/usr/bin/env node
import type { RunningService } from "../composition/root";
import { startService } from "../composition/root";
import { ConfigError } from "../shared/config/config.error";

type CliErrorEnvelope = {
  event: "server.failed";
  name: string;
  message: string;
  code?: string;
  /** environment variable that failed to parse */
  key?: string;
  /** bind target of a failed listen */
  address?: string;
  port?: number;
  stack?: string;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.trim().toLowerCase() ?? "");

const pick = (err: unknown, field: string): unknown =>
  typeof err === "object" && err !== null ? Reflect.get(err, field) : undefined;

/**
 * Start-up failure as one JSON line: config errors name their variable, listen
 * errors their bind target. Causes are never included; the stack only in debug mode.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: CliErrorEnvelope = { event: "server.failed", name: error.name || "Error", message: error.message };

  const code = pick(err, "code");
  if (typeof code === "string") envelope.code = code;

  if (err instanceof ConfigError) envelope.key = err.key;

  const address = pick(err, "address");
  const port = pick(err, "port");
  if (typeof address === "string") envelope.address = address;
  if (typeof port === "number") envelope.port = port;

  if (includeStack && error.stack) envelope.stack = error.stack;

  return envelope;
};

const shutdownSignals = ["SIGINT", "SIGTERM"] as const;

type SignalSource = Pick<NodeJS.EventEmitter, "once" | "off">;

/**
 * Shuts the service down on the first SIGINT/SIGTERM. Resolves once shutdown
 * has finished, rejects if it failed.
 */
export const installShutdownHandlers = (
  service: Pick<RunningService, "shutdown">,
  source: SignalSource = process
): Promise<NodeJS.Signals> =>
  new Promise((resolve, reject) => {
    const onSignal = (signal: NodeJS.Signals) => {
      for (const name of shutdownSignals) source.off(name, onSignal);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ event: "server.shutdown", phase: "started", signal }));

      service.shutdown().then(
        () => {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify({ event: "server.shutdown", phase: "completed", signal }));
          resolve(signal);
        },
        reject
      );
    };

    for (const name of shutdownSignals) source.once(name, onSignal);
  });

export const executeServeCli = async (): Promise<void> => {
  try {
    const service = await startService();
    await installShutdownHandlers(service);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeServeCli();
}
