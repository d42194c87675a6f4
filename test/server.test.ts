import { afterEach, describe, expect, test } from "vitest";
import { send } from "../src/web/http.js";
import { startServer, type RunningServer } from "../src/web/server.js";
import { recordingLogger } from "./fakes.js";

let server: RunningServer | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
});

async function start(): Promise<string> {
  server = await startServer({
    host: "127.0.0.1",
    port: 0,
    logger: recordingLogger(),
    routes: {
      "POST /echo": async (_req, res) => send(res, { status: 200, contentType: "text/plain", body: "echo" }),
      "POST /boom": async () => {
        throw new Error("boom");
      },
    },
  });
  return `http://127.0.0.1:${server.port}`;
}

describe("startServer", () => {
  test("serves health checks and registered routes", async () => {
    const base = await start();
    const health = await fetch(`${base}/healthz`);
    expect(health.status).toBe(200);
    expect(await health.text()).toBe("ok");

    const echo = await fetch(`${base}/echo`, { method: "POST", body: "{}" });
    expect(await echo.text()).toBe("echo");
  });

  test("answers 404 for unknown paths and 405 for wrong methods", async () => {
    const base = await start();
    expect((await fetch(`${base}/missing`)).status).toBe(404);
    expect((await fetch(`${base}/echo`)).status).toBe(405);
  });

  test("turns handler errors into 500", async () => {
    const base = await start();
    expect((await fetch(`${base}/boom`, { method: "POST" })).status).toBe(500);
  });
});
