import { decodeEvent } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import type { TopicMessage } from "../bus/topic.js";
import type { Logger } from "../utils/logger.js";
import type { Responder, ResponderOutcome } from "./responder.js";

export async function processMessage(msg: TopicMessage, responder: Responder, logger: Logger): Promise<ResponderOutcome> {
  logger.info(`Received a message: ${msg.id}`);
  const event = decodeEvent(msg.data);
  const outcome = await responder.handle(event);
  if (outcome.status === "failed") logger.warn(`Message ${msg.id} failed: ${outcome.error}`);
  else logger.debug(`Message ${msg.id}: ${outcome.action}${outcome.reason ? ` (${outcome.reason})` : ""}`);
  return outcome;
}

/**
 * Feeds the in-process bus to the responder until the bus is closed. Each
 * message is handled independently; resolves after the last one settles.
 */
export async function consumeBus(bus: MessageBus, responder: Responder, logger: Logger): Promise<void> {
  const active = new Set<Promise<void>>();
  for (let msg = await bus.consume(); msg; msg = await bus.consume()) {
    const current = msg;
    const task = processMessage(current, responder, logger)
      .then(() => undefined, (err: unknown) => logger.error(`Dropping message ${current.id}: ${String(err)}`))
      .finally(() => active.delete(task));
    active.add(task);
  }
  await Promise.all(active);
}
