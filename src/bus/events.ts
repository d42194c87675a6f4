import { z } from "zod";

export type EventKind = "app_mention" | "message";

export type ChannelType = "public" | "other";

/** One Slack event as it travels from the ingress filter to the responder. */
export interface NormalizedEvent {
  kind: EventKind;
  channel: string;
  channelType: ChannelType;
  user: string;
  text: string;
  ts: string;
  /** Thread-root timestamp, "" outside threads. */
  threadTs: string;
  fileUrls: string[];
}

export class EventDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventDecodeError";
  }
}

const normalizedEventSchema = z.object({
  kind: z.enum(["app_mention", "message"]),
  channel: z.string(),
  channelType: z.enum(["public", "other"]),
  user: z.string(),
  text: z.string(),
  ts: z.string(),
  threadTs: z.string(),
  fileUrls: z.array(z.string()),
});

export function encodeEvent(event: NormalizedEvent): Buffer {
  const ordered: NormalizedEvent = {
    kind: event.kind,
    channel: event.channel,
    channelType: event.channelType,
    user: event.user,
    text: event.text,
    ts: event.ts,
    threadTs: event.threadTs,
    fileUrls: [...event.fileUrls],
  };
  return Buffer.from(JSON.stringify(ordered), "utf8");
}

export function decodeEvent(data: Buffer | Uint8Array): NormalizedEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(data).toString("utf8"));
  } catch (err) {
    throw new EventDecodeError(`payload is not JSON: ${String(err)}`);
  }
  const parsed = normalizedEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EventDecodeError(`invalid event: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "unknown"}`);
  }
  return parsed.data;
}

export function isInThread(event: NormalizedEvent): boolean {
  return event.threadTs !== "";
}
