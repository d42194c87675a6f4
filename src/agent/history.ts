import type { ThreadReply } from "../channels/slack/client.js";
import { stripMention } from "../channels/slack/format.js";
import { blobPart, textPart, type Part, type Turn } from "../providers/base.js";
import type { Logger } from "../utils/logger.js";
import { fetchBlobs, type Fetcher } from "./attachments.js";

/** The bot only continues a thread when the reply before the trigger is its own. */
export function isBotsTurn(replies: ThreadReply[], botUser: string): boolean {
  return replies.length >= 2 && replies[replies.length - 2].user === botUser;
}

/**
 * Rebuilds chat history from a thread, root first. The last reply is the
 * trigger and is left out. Turns with neither text nor files are skipped,
 * since the model rejects empty content.
 */
export async function buildHistory(replies: ThreadReply[], botUser: string, fetcher: Fetcher, logger: Logger): Promise<Turn[]> {
  const turns = await Promise.all(
    replies.slice(0, -1).map(async (reply): Promise<Turn> => {
      const parts: Part[] = [];
      const text = stripMention(reply.text, botUser);
      if (text) parts.push(textPart(text));
      const blobs = await fetchBlobs(reply.fileUrls, fetcher, logger);
      parts.push(...blobs.map(blobPart));
      return { role: reply.user === botUser ? "model" : "user", parts };
    }),
  );
  return turns.filter((t) => t.parts.length > 0);
}
