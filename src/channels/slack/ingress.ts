import { z } from "zod";
import type { ChannelType, NormalizedEvent } from "../../bus/events.js";
import { hasAnyMention } from "./format.js";

const fileSchema = z.object({ url_private_download: z.string().optional() });

const innerEventSchema = z.object({
  type: z.string(),
  subtype: z.string().optional(),
  channel: z.string().optional(),
  channel_type: z.string().optional(),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  text: z.string().optional(),
  ts: z.string().optional(),
  thread_ts: z.string().optional(),
  files: z.array(fileSchema).optional(),
});

const envelopeSchema = z.object({
  type: z.string(),
  challenge: z.string().optional(),
  event_id: z.string().optional(),
  authorizations: z.array(z.object({ user_id: z.string().optional(), is_bot: z.boolean().optional() })).optional(),
  event: innerEventSchema.optional(),
});

export type SlackEnvelope = z.infer<typeof envelopeSchema>;
export type SlackInnerEvent = z.infer<typeof innerEventSchema>;

export type IngressResult =
  | { kind: "challenge"; challenge: string }
  | { kind: "event"; event: NormalizedEvent; eventId?: string }
  | { kind: "drop"; reason: string; loud: boolean }
  | { kind: "invalid"; reason: string };

export interface IngressOptions {
  forwardAppMentions: boolean;
}

const ACCEPTED_SUBTYPES = new Set([undefined, "file_share", "thread_broadcast"]);

function drop(reason: string, loud = false): IngressResult {
  return { kind: "drop", reason, loud };
}

function channelTypeOf(inner: SlackInnerEvent): ChannelType {
  if (inner.channel_type) return inner.channel_type === "channel" ? "public" : "other";
  // app_mention carries no channel_type; public channel ids start with C
  return inner.channel?.startsWith("C") ? "public" : "other";
}

function ownBotUser(envelope: SlackEnvelope): string | undefined {
  return envelope.authorizations?.find((a) => a.is_bot && a.user_id)?.user_id;
}

export function normalize(kind: NormalizedEvent["kind"], inner: SlackInnerEvent): NormalizedEvent {
  return {
    kind,
    channel: inner.channel ?? "",
    channelType: channelTypeOf(inner),
    user: inner.user ?? "",
    text: inner.text ?? "",
    ts: inner.ts ?? "",
    threadTs: inner.thread_ts ?? "",
    fileUrls: (inner.files ?? []).flatMap((f) => (f.url_private_download ? [f.url_private_download] : [])),
  };
}

/**
 * Decides what the webhook does with one Events API payload: answer the
 * handshake, forward a normalized event, or drop it.
 */
export function classifyPayload(payload: unknown, opts: IngressOptions): IngressResult {
  const parsed = envelopeSchema.safeParse(payload);
  if (!parsed.success) return { kind: "invalid", reason: "not a Slack Events API payload" };
  const envelope = parsed.data;

  if (envelope.type === "url_verification") {
    if (envelope.challenge === undefined) return { kind: "invalid", reason: "url_verification without challenge" };
    return { kind: "challenge", challenge: envelope.challenge };
  }
  if (envelope.type !== "event_callback") return drop(`unsupported payload type: ${envelope.type}`, true);

  const inner = envelope.event;
  if (!inner) return { kind: "invalid", reason: "event_callback without event" };

  switch (inner.type) {
    case "app_mention":
      if (!opts.forwardAppMentions) return drop("app_mention is handled through its message event");
      return { kind: "event", event: normalize("app_mention", inner), eventId: envelope.event_id };
    case "message": {
      if (!ACCEPTED_SUBTYPES.has(inner.subtype)) return drop(`message subtype ${inner.subtype}`);
      if (!inner.user) return drop(inner.bot_id ? "bot message" : "message without author");
      if (inner.user === ownBotUser(envelope)) return drop("own message");
      const event = normalize("message", inner);
      if (event.channelType === "public" && !event.threadTs && !hasAnyMention(event.text)) {
        return drop("unaddressed channel message");
      }
      return { kind: "event", event, eventId: envelope.event_id };
    }
    default:
      return drop(`unsupported inner event type: ${inner.type}`, true);
  }
}
