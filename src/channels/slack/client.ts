import {
  LogLevel,
  WebClient,
  type AuthTestResponse,
  type ChatPostMessageArguments,
  type ConversationsRepliesArguments,
  type ConversationsRepliesResponse,
  type FilesUploadV2Arguments,
} from "@slack/web-api";
import type { Blob } from "../../providers/base.js";
import { buildSectionBlocks } from "./format.js";

export interface ThreadReply {
  user: string;
  text: string;
  fileUrls: string[];
}

export interface PostMessageInput {
  channel: string;
  text: string;
  threadTs?: string;
}

export interface UploadFileInput {
  channel: string;
  threadTs?: string;
  blob: Blob;
  filename: string;
  initialComment?: string;
}

/** The Slack calls the relay depends on. */
export interface SlackPlatform {
  /** User id of the bot the token belongs to. */
  identity(): Promise<string>;
  /** Every message of a thread, root first. */
  replies(channel: string, threadTs: string): Promise<ThreadReply[]>;
  postMessage(input: PostMessageInput): Promise<void>;
  uploadFile(input: UploadFileInput): Promise<void>;
  /** Downloads a private file URL; rejects on a non-2xx status. */
  download(url: string): Promise<Buffer>;
}

type FetchFn = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

/** The slice of `WebClient` this platform calls. */
export interface SlackWebApi {
  auth: { test(): Promise<AuthTestResponse> };
  conversations: { replies(args: ConversationsRepliesArguments): Promise<ConversationsRepliesResponse> };
  chat: { postMessage(args: ChatPostMessageArguments): Promise<unknown> };
  files: { uploadV2(args: FilesUploadV2Arguments): Promise<unknown> };
}

export class WebSlackPlatform implements SlackPlatform {
  private readonly client: SlackWebApi;
  private readonly fetchImpl: FetchFn;

  constructor(private readonly token: string, opts: { debug?: boolean; client?: SlackWebApi; fetch?: FetchFn } = {}) {
    if (!token) throw new Error("Slack bot token is not configured. Set SLACK_BOT_TOKEN.");
    this.client = opts.client ?? new WebClient(token, { logLevel: opts.debug ? LogLevel.DEBUG : LogLevel.WARN });
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  async identity(): Promise<string> {
    const res = await this.client.auth.test();
    if (!res.user_id) throw new Error("auth.test returned no user_id");
    return res.user_id;
  }

  async replies(channel: string, threadTs: string): Promise<ThreadReply[]> {
    const out: ThreadReply[] = [];
    let cursor: string | undefined;
    do {
      const res = await this.client.conversations.replies({ channel, ts: threadTs, cursor });
      for (const msg of res.messages ?? []) {
        out.push({
          user: msg.user ?? "",
          text: msg.text ?? "",
          fileUrls: (msg.files ?? []).flatMap((f) => (f.url_private_download ? [f.url_private_download] : [])),
        });
      }
      cursor = res.response_metadata?.next_cursor || undefined;
    } while (cursor);
    return out;
  }

  async postMessage(input: PostMessageInput): Promise<void> {
    await this.client.chat.postMessage({
      channel: input.channel,
      text: input.text,
      blocks: buildSectionBlocks(input.text),
      thread_ts: input.threadTs,
    });
  }

  async uploadFile(input: UploadFileInput): Promise<void> {
    const destination = input.threadTs
      ? { channel_id: input.channel, thread_ts: input.threadTs }
      : { channel_id: input.channel };
    await this.client.files.uploadV2({
      ...destination,
      file: input.blob.data,
      filename: input.filename,
      title: input.filename,
      initial_comment: input.initialComment,
    });
  }

  async download(url: string): Promise<Buffer> {
    const res = await this.fetchImpl(url, { headers: { Authorization: `Bearer ${this.token}` } });
    if (!res.ok) throw new Error(`download failed: ${res.status} ${res.statusText}`);
    return Buffer.from(await res.arrayBuffer());
  }
}
