import type { IncomingMessage, ServerResponse } from "node:http";

export interface HttpReply {
  status: number;
  contentType?: string;
  body: string;
}

export class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} byte limit`);
    this.name = "BodyTooLargeError";
  }
}

export function readRawBody(req: IncomingMessage, maxBytes = 1024 * 1024): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    req.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total > maxBytes) {
        req.destroy();
        reject(new BodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

export function parseJson(raw: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw.toString("utf8")) };
  } catch {
    return { ok: false };
  }
}

export function headerValue(req: Pick<IncomingMessage, "headers">, name: string): string {
  const v = req.headers[name];
  return Array.isArray(v) ? v[0] ?? "" : v ?? "";
}

export function send(res: ServerResponse, reply: HttpReply): void {
  res.statusCode = reply.status;
  if (reply.contentType) res.setHeader("Content-Type", reply.contentType);
  res.end(reply.body);
}

export function empty(status: number): HttpReply {
  return { status, body: "" };
}
