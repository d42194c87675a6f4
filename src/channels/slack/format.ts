import type { KnownBlock } from "@slack/web-api";

const LIST_MARKER = /(\n+\s*)\* /g;
const ANY_MENTION = /<@\w+>/;
const SECTION_TEXT_LIMIT = 3000;

/** Adapts model markdown to Slack mrkdwn: "* " list items become "- ", "**" becomes "*". */
export function formatMarkdown(text: string): string {
  return text.replace(LIST_MARKER, "$1- ").replaceAll("**", "*");
}

export function mentionToken(userId: string): string {
  return `<@${userId}>`;
}

export function hasAnyMention(text: string): boolean {
  return ANY_MENTION.test(text);
}

export function mentions(text: string, userId: string): boolean {
  return text.includes(mentionToken(userId));
}

export function stripMention(text: string, userId: string): string {
  return text.split(mentionToken(userId)).join("").trim();
}

export function splitMessage(content: string, maxLen = SECTION_TEXT_LIMIT): string[] {
  if (content.length <= maxLen) return [content];
  const chunks: string[] = [];
  let rest = content;
  while (rest.length > maxLen) {
    const cut = rest.slice(0, maxLen);
    let idx = Math.max(cut.lastIndexOf("\n"), cut.lastIndexOf(" "));
    if (idx <= 0) idx = maxLen;
    chunks.push(rest.slice(0, idx));
    rest = rest.slice(idx).trimStart();
  }
  if (rest) chunks.push(rest);
  return chunks;
}

/** One mrkdwn section per chunk; Slack caps a section's text at 3000 characters. */
export function buildSectionBlocks(text: string): KnownBlock[] {
  return splitMessage(text).map((chunk): KnownBlock => ({ type: "section", text: { type: "mrkdwn", text: chunk } }));
}

/** "image/png" → "png", the way the upload file name is suffixed. */
export function mimeSubtype(mimeType: string): string {
  const base = mimeType.split(";")[0].trim();
  const slash = base.lastIndexOf("/");
  return slash >= 0 ? base.slice(slash + 1) : base;
}
