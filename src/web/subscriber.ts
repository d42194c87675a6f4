import { z } from "zod";
import { processMessage } from "../agent/consumer.js";
import type { Responder } from "../agent/responder.js";
import { EventDecodeError } from "../bus/events.js";
import type { Logger } from "../utils/logger.js";
import { empty, parseJson, readRawBody, send, type HttpReply } from "./http.js";
import type { RouteHandler } from "./server.js";

// Pub/Sub push delivery body
const pushSchema = z.object({
  message: z.object({
    data: z.string().default(""),
    messageId: z.string().optional(),
    message_id: z.string().optional(),
  }),
  subscription: z.string().optional(),
});

export interface SubscriberDeps {
  responder: Responder;
  logger: Logger;
}

export async function handlePush(body: Buffer, deps: SubscriberDeps): Promise<HttpReply> {
  const json = parseJson(body);
  const parsed = json.ok ? pushSchema.safeParse(json.value) : null;
  if (!parsed?.success) {
    deps.logger.warn("Rejected push request: not a Pub/Sub push envelope");
    return empty(400);
  }

  const { message } = parsed.data;
  const msg = { id: message.messageId ?? message.message_id ?? "unknown", data: Buffer.from(message.data, "base64") };
  try {
    const outcome = await processMessage(msg, deps.responder, deps.logger);
    return empty(outcome.status === "ok" ? 204 : 500);
  } catch (err) {
    if (err instanceof EventDecodeError) {
      deps.logger.warn(`Rejected message ${msg.id}: ${err.message}`);
      return empty(400);
    }
    throw err;
  }
}

export function subscriberRoute(deps: SubscriberDeps): RouteHandler {
  return async (req, res) => {
    let body: Buffer;
    try {
      body = await readRawBody(req, 10 * 1024 * 1024);
    } catch (err) {
      deps.logger.warn(`No request body: ${String(err)}`);
      return send(res, empty(400));
    }
    send(res, await handlePush(body, deps));
  };
}
