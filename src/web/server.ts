import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import chalk from "chalk";
import type { Logger } from "../utils/logger.js";
import { empty, send } from "./http.js";

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** Routes keyed by "METHOD /path". */
export type Routes = Record<string, RouteHandler>;

export interface RunningServer {
  port: number;
  close: () => Promise<void>;
}

const methodColors: Record<string, (s: string) => string> = {
  GET: chalk.green,
  POST: chalk.blue,
};

export function startServer(input: { routes: Routes; host: string; port: number; logger: Logger }): Promise<RunningServer> {
  const routes: Routes = {
    "GET /healthz": async (_req, res) => send(res, { status: 200, contentType: "text/plain", body: "ok" }),
    ...input.routes,
  };
  const paths = new Set(Object.keys(routes).map((key) => key.slice(key.indexOf(" ") + 1)));

  const server = createServer(async (req, res) => {
    const method = req.method || "GET";
    const pathname = new URL(req.url || "/", "http://localhost").pathname;
    const color = methodColors[method] ?? chalk.white;
    input.logger.debug(`${color(method)} ${pathname}`);

    const handler = routes[`${method} ${pathname}`];
    if (!handler) return send(res, empty(paths.has(pathname) ? 405 : 404));
    try {
      await handler(req, res);
    } catch (err) {
      input.logger.error(`Unhandled error on ${method} ${pathname}: ${String(err)}`);
      if (!res.headersSent) send(res, empty(500));
      else res.end();
    }
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(input.port, input.host, () => {
      server.off("error", reject);
      const addr = server.address();
      resolve({
        port: typeof addr === "object" && addr ? addr.port : input.port,
        close: () => new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });
}
