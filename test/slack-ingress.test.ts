import { describe, expect, test } from "vitest";
import { classifyPayload } from "../src/channels/slack/ingress.js";

const defaults = { forwardAppMentions: false };

function callback(event: Record<string, unknown>) {
  return {
    type: "event_callback",
    event_id: "Ev01",
    authorizations: [{ user_id: "UBOT", is_bot: true }],
    event,
  };
}

describe("classifyPayload", () => {
  test("answers the url_verification handshake", () => {
    expect(classifyPayload({ type: "url_verification", challenge: "abc123" }, defaults)).toEqual({
      kind: "challenge",
      challenge: "abc123",
    });
  });

  test("rejects a handshake without challenge", () => {
    expect(classifyPayload({ type: "url_verification" }, defaults).kind).toBe("invalid");
  });

  test("rejects payloads that are not envelopes", () => {
    expect(classifyPayload("nope", defaults).kind).toBe("invalid");
    expect(classifyPayload({ type: "event_callback" }, defaults).kind).toBe("invalid");
  });

  test("drops unsupported payload types loudly", () => {
    expect(classifyPayload({ type: "app_rate_limited" }, defaults)).toEqual({
      kind: "drop",
      reason: "unsupported payload type: app_rate_limited",
      loud: true,
    });
  });

  test("forwards a channel message that mentions someone", () => {
    const result = classifyPayload(
      callback({
        type: "message",
        channel: "C1",
        channel_type: "channel",
        user: "U1",
        text: "<@UBOT> hi",
        ts: "1.1",
        files: [{ url_private_download: "https://files.example/x" }, {}],
      }),
      defaults,
    );
    expect(result).toEqual({
      kind: "event",
      eventId: "Ev01",
      event: {
        kind: "message",
        channel: "C1",
        channelType: "public",
        user: "U1",
        text: "<@UBOT> hi",
        ts: "1.1",
        threadTs: "",
        fileUrls: ["https://files.example/x"],
      },
    });
  });

  test("forwards direct messages without a mention", () => {
    const result = classifyPayload(
      callback({ type: "message", channel: "D1", channel_type: "im", user: "U1", text: "hello", ts: "2.2" }),
      defaults,
    );
    expect(result.kind).toBe("event");
    if (result.kind === "event") expect(result.event.channelType).toBe("other");
  });

  test("forwards unaddressed thread replies", () => {
    const result = classifyPayload(
      callback({ type: "message", channel: "C1", channel_type: "channel", user: "U1", text: "more", ts: "3.3", thread_ts: "3.1" }),
      defaults,
    );
    expect(result.kind).toBe("event");
    if (result.kind === "event") expect(result.event.threadTs).toBe("3.1");
  });

  test("drops unaddressed channel messages", () => {
    const result = classifyPayload(
      callback({ type: "message", channel: "C1", channel_type: "channel", user: "U1", text: "chatter", ts: "4.4" }),
      defaults,
    );
    expect(result).toEqual({ kind: "drop", reason: "unaddressed channel message", loud: false });
  });

  test("drops the bot's own messages", () => {
    const result = classifyPayload(
      callback({ type: "message", channel: "D1", channel_type: "im", user: "UBOT", text: "answer", ts: "5.5" }),
      defaults,
    );
    expect(result).toEqual({ kind: "drop", reason: "own message", loud: false });
  });

  test("drops bot and edited messages", () => {
    expect(classifyPayload(callback({ type: "message", subtype: "bot_message", bot_id: "B1", text: "x" }), defaults)).toEqual({
      kind: "drop",
      reason: "message subtype bot_message",
      loud: false,
    });
    expect(classifyPayload(callback({ type: "message", bot_id: "B1", text: "x" }), defaults)).toEqual({
      kind: "drop",
      reason: "bot message",
      loud: false,
    });
    expect(classifyPayload(callback({ type: "message", subtype: "message_changed" }), defaults).kind).toBe("drop");
  });

  test("keeps file shares", () => {
    const result = classifyPayload(
      callback({ type: "message", subtype: "file_share", channel: "D1", channel_type: "im", user: "U1", text: "", ts: "6.6" }),
      defaults,
    );
    expect(result.kind).toBe("event");
  });

  test("drops app_mention unless forwarding is enabled", () => {
    const payload = callback({ type: "app_mention", channel: "C9", user: "U1", text: "<@UBOT> yo", ts: "7.7" });
    expect(classifyPayload(payload, defaults).kind).toBe("drop");

    const result = classifyPayload(payload, { forwardAppMentions: true });
    expect(result.kind).toBe("event");
    if (result.kind === "event") {
      expect(result.event.kind).toBe("app_mention");
      expect(result.event.channelType).toBe("public");
    }
  });

  test("drops other inner events loudly", () => {
    expect(classifyPayload(callback({ type: "reaction_added" }), defaults)).toEqual({
      kind: "drop",
      reason: "unsupported inner event type: reaction_added",
      loud: true,
    });
  });
});
