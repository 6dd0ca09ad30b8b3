import http from "http";
import { URL } from "url";

/**
 * Minimal fake upstream for local runs and tests.
 * - GET /ok                      -> 200
 * - GET /status/:code            -> that status code
 * - GET /slow?delayMs=...        -> 200 after the delay (default 5000ms)
 * Any other path answers 404.
 *
 * `requests` counts every request received; `active` those not yet answered.
 * `authorizations` keeps the Authorization header of every request that sent one.
 */
export type FakeResourceServer = {
  server: http.Server;
  stats: () => { requests: number; active: number; peakActive: number; authorizations: string[] };
};

export const createFakeResourceServer = (): FakeResourceServer => {
  let requests = 0;
  let active = 0;
  let peakActive = 0;
  const authorizations: string[] = [];

  const server = http.createServer((req, res) => {
    requests += 1;
    active += 1;
    peakActive = Math.max(peakActive, active);
    if (req.headers.authorization) authorizations.push(req.headers.authorization);
    res.on("close", () => {
      active -= 1;
    });

    const url = new URL(req.url ?? "/", "http://localhost");
    const reply = (status: number) => {
      res.writeHead(status, { "content-type": "text/plain" });
      res.end(String(status));
    };

    if (url.pathname === "/ok") return reply(200);

    const statusMatch = /^\/status\/([2-5]\d\d)$/.exec(url.pathname);
    if (statusMatch) return reply(Number(statusMatch[1]));

    if (url.pathname === "/slow") {
      const delayMs = Number(url.searchParams.get("delayMs") ?? "5000");
      const timer = setTimeout(() => reply(200), Number.isFinite(delayMs) ? delayMs : 5000);
      res.on("close", () => clearTimeout(timer));
      return;
    }

    return reply(404);
  });

  return { server, stats: () => ({ requests, active, peakActive, authorizations: [...authorizations] }) };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_RESOURCE_PORT ?? 3999);
  const { server } = createFakeResourceServer();

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake resource server on http://localhost:${port}`);
  });
}
