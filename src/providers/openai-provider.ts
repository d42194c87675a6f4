import OpenAI from "openai";
import { textPart, type ChatSession, type GenerativeModel, type ModelResponse, type Part, type Turn } from "./base.js";

type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.ChatCompletionContentPart;

function isTextLike(mimeType: string): boolean {
  return mimeType.startsWith("text/") || mimeType.startsWith("application/json");
}

export function toContentPart(part: Part): ContentPart {
  if (part.kind === "text") return { type: "text", text: part.text };
  const { mimeType, data } = part.blob;
  if (mimeType.startsWith("image/")) {
    return { type: "image_url", image_url: { url: `data:${mimeType};base64,${data.toString("base64")}` } };
  }
  if (isTextLike(mimeType)) return { type: "text", text: `Attached file (${mimeType}):\n${data.toString("utf8")}` };
  return { type: "text", text: `[attached ${mimeType} file, ${data.length} bytes, not readable by this model]` };
}

export function toMessages(history: Turn[], next: Part[]): MessageParam[] {
  const messages: MessageParam[] = history.map((turn): MessageParam => {
    if (turn.role === "model") {
      const text = turn.parts.flatMap((p) => (p.kind === "text" ? [p.text] : [])).join("\n");
      return { role: "assistant", content: text };
    }
    return { role: "user", content: turn.parts.map(toContentPart) };
  });
  messages.push({ role: "user", content: next.map(toContentPart) });
  return messages;
}

export class OpenAICompatibleProvider implements GenerativeModel {
  private readonly client: OpenAI;

  constructor(apiKey: string, readonly name: string, apiBase: string | null = null, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey, baseURL: apiBase ?? undefined });
  }

  private async complete(messages: MessageParam[]): Promise<ModelResponse> {
    const res = await this.client.chat.completions.create({ model: this.name, messages });
    return {
      candidates: res.choices.map((choice) => ({
        parts: choice.message.content ? [textPart(choice.message.content)] : [],
      })),
    };
  }

  async generate(parts: Part[]): Promise<ModelResponse> {
    return this.complete(toMessages([], parts));
  }

  startChat(history: Turn[]): ChatSession {
    return { send: (parts) => this.complete(toMessages(history, parts)) };
  }
}
