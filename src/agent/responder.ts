import { isInThread, type NormalizedEvent } from "../bus/events.js";
import type { SlackPlatform, ThreadReply } from "../channels/slack/client.js";
import { formatMarkdown, mentions, mimeSubtype, stripMention } from "../channels/slack/format.js";
import { blobPart, splitFirstCandidate, textPart, type GenerativeModel, type ModelResponse, type Part } from "../providers/base.js";
import type { Logger } from "../utils/logger.js";
import { fetchBlobs, type Fetcher } from "./attachments.js";
import { buildHistory, isBotsTurn } from "./history.js";

export type ResponderAction = "posted" | "uploaded" | "none";

export type ResponderOutcome =
  | { status: "ok"; action: ResponderAction; reason?: string }
  | { status: "failed"; error: string };

interface Invocation {
  event: NormalizedEvent;
  botUser: string;
  prompt: string;
}

function none(reason: string): ResponderOutcome {
  return { status: "ok", action: "none", reason };
}

export class Responder {
  private readonly fetcher: Fetcher;
  private readonly now: () => Date;

  constructor(private readonly input: {
    slack: SlackPlatform;
    model: GenerativeModel;
    logger: Logger;
    now?: () => Date;
  }) {
    this.fetcher = (url) => input.slack.download(url);
    this.now = input.now ?? (() => new Date());
  }

  private get logger(): Logger {
    return this.input.logger;
  }

  /**
   * Handles one queued event. Performs at most one post or upload; downstream
   * failures end in a logged no-op. Only a failed identity lookup is reported
   * as "failed" so the queue can redeliver.
   */
  async handle(event: NormalizedEvent): Promise<ResponderOutcome> {
    let botUser: string;
    try {
      botUser = await this.input.slack.identity();
    } catch (err) {
      this.logger.error(`Failed to resolve bot identity: ${String(err)}`);
      return { status: "failed", error: String(err) };
    }
    if (event.user === botUser) return none("own message");

    this.logger.debug(`${event.kind} event`, event);
    const inv: Invocation = { event, botUser, prompt: stripMention(event.text, botUser) };

    switch (event.kind) {
      case "app_mention":
        return this.answer(inv, event.threadTs || event.ts);
      case "message": {
        if (isInThread(event)) return this.continueThread(inv);
        const mentioned = mentions(event.text, botUser);
        if (event.channelType === "public" && !mentioned) return none("unaddressed channel message");
        return this.answer(inv, mentioned ? event.ts : undefined);
      }
    }
  }

  private async assemble(inv: Invocation): Promise<Part[] | null> {
    if (!inv.prompt && !inv.event.fileUrls.length) return null;
    const blobs = await fetchBlobs(inv.event.fileUrls, this.fetcher, this.logger);
    const parts: Part[] = inv.prompt ? [textPart(inv.prompt)] : [];
    parts.push(...blobs.map(blobPart));
    return parts.length ? parts : null;
  }

  private async answer(inv: Invocation, threadTs: string | undefined): Promise<ResponderOutcome> {
    const parts = await this.assemble(inv);
    if (!parts) return none("empty prompt");

    let res: ModelResponse;
    try {
      res = await this.input.model.generate(parts);
    } catch (err) {
      this.logger.error(`Failed to get model response: ${String(err)}`);
      return none("model call failed");
    }
    return this.deliver(inv.event, res, threadTs);
  }

  private async continueThread(inv: Invocation): Promise<ResponderOutcome> {
    const { event, botUser } = inv;
    if (!inv.prompt && !event.fileUrls.length) return none("empty prompt");

    let replies: ThreadReply[];
    try {
      replies = await this.input.slack.replies(event.channel, event.threadTs);
    } catch (err) {
      this.logger.error(`Failed to get thread content: ${String(err)}`);
      return none("thread fetch failed");
    }
    replies.forEach((msg, i) => this.logger.debug(`replies[${i}]`, msg));
    if (!isBotsTurn(replies, botUser)) return none("thread not continued from the bot");

    const [history, parts] = await Promise.all([
      buildHistory(replies, botUser, this.fetcher, this.logger),
      this.assemble(inv),
    ]);
    if (!parts) return none("empty prompt");

    let res: ModelResponse;
    try {
      res = await this.input.model.startChat(history).send(parts);
    } catch (err) {
      this.logger.error(`Failed to get model response: ${String(err)}`);
      return none("model call failed");
    }
    return this.deliver(event, res, event.threadTs);
  }

  private async deliver(event: NormalizedEvent, res: ModelResponse, threadTs: string | undefined): Promise<ResponderOutcome> {
    const { texts, blobs } = splitFirstCandidate(res);
    const text = texts.map(formatMarkdown).join("\n");
    if (!text && !blobs.length) return none("empty model response");

    const [blob, ...extra] = blobs;
    if (!blob) {
      try {
        await this.input.slack.postMessage({ channel: event.channel, text, threadTs });
      } catch (err) {
        this.logger.error(`Failed to post message: ${String(err)}`);
        return none("post failed");
      }
      return { status: "ok", action: "posted" };
    }

    // only one generated file is uploaded per reply
    if (extra.length) this.logger.debug(`Discarding ${extra.length} extra generated attachment(s)`);
    const filename = `file_${Math.floor(this.now().getTime() / 1000)}.${mimeSubtype(blob.mimeType)}`;
    try {
      await this.input.slack.uploadFile({
        channel: event.channel,
        threadTs,
        blob,
        filename,
        initialComment: text || undefined,
      });
    } catch (err) {
      this.logger.error(`Failed to upload file: ${String(err)}`);
      return none("upload failed");
    }
    return { status: "ok", action: "uploaded" };
  }
}
