import type { IncomingMessage } from "node:http";
import { encodeEvent } from "../bus/events.js";
import type { Topic } from "../bus/topic.js";
import { classifyPayload } from "../channels/slack/ingress.js";
import { verifySlackSignature } from "../channels/slack/signature.js";
import type { Logger } from "../utils/logger.js";
import { empty, headerValue, parseJson, readRawBody, send, type HttpReply } from "./http.js";
import type { RouteHandler } from "./server.js";

export interface IngressDeps {
  topic: Topic;
  logger: Logger;
  forwardAppMentions: boolean;
  /** When set, requests must carry a valid x-slack-signature. */
  signingSecret?: string;
  now?: () => number;
}

export interface WebhookRequest {
  headers: IncomingMessage["headers"];
  body: Buffer;
}

export async function handleWebhook(req: WebhookRequest, deps: IngressDeps): Promise<HttpReply> {
  const { logger } = deps;
  if (deps.signingSecret) {
    const timestamp = headerValue(req, "x-slack-request-timestamp");
    const signature = headerValue(req, "x-slack-signature");
    if (!verifySlackSignature(deps.signingSecret, timestamp, req.body, signature, deps.now?.())) {
      logger.warn("Invalid Slack signature, rejecting request");
      return empty(401);
    }
  }

  const json = parseJson(req.body);
  if (!json.ok) {
    logger.warn("Invalid JSON body");
    return empty(400);
  }

  const result = classifyPayload(json.value, { forwardAppMentions: deps.forwardAppMentions });
  switch (result.kind) {
    case "challenge":
      return { status: 200, contentType: "text/plain", body: result.challenge };
    case "invalid":
      logger.warn(`Rejected payload: ${result.reason}`);
      return empty(400);
    case "drop":
      if (result.loud) logger.warn(`Dropped: ${result.reason}`);
      else logger.debug(`Dropped: ${result.reason}`);
      return empty(200);
    case "event":
      logger.debug(`${result.event.kind} event`, result.event);
      try {
        const id = await deps.topic.publish(encodeEvent(result.event));
        logger.info(`Published a message: ${id}${result.eventId ? ` (event ${result.eventId})` : ""}`);
        return empty(200);
      } catch (err) {
        logger.error(`Failed to publish event: ${String(err)}`);
        return empty(500);
      }
  }
}

export function ingressRoute(deps: IngressDeps): RouteHandler {
  return async (req, res) => {
    let body: Buffer;
    try {
      body = await readRawBody(req);
    } catch (err) {
      deps.logger.warn(`No request body: ${String(err)}`);
      return send(res, empty(400));
    }
    send(res, await handleWebhook({ headers: req.headers, body }, deps));
  };
}
